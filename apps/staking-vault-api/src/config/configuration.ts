import { throwError } from "../../../../libs/staking-vault/src/utils/error";

export type DatabaseType = "mysql" | "sqlite";

export interface IConfig {
  // server port (VAULT_API_PORT)
  port: number;
  base_path: string;

  // DB credentials
  db_type: DatabaseType;
  db_host: string;
  db_port: number;
  db_user: string;
  db_pass: string;
  db_name: string;
  // used when db_type is sqlite
  db_sqlite3_path: string;
}

function databaseType(value: string | undefined): DatabaseType {
  if (value === undefined || value === "mysql") return "mysql";
  if (value === "sqlite") return value;
  return throwError(`DB_TYPE must be "mysql" or "sqlite", got "${value}"`);
}

export default () => {
  const db_type = databaseType(process.env.DB_TYPE);
  const mysql = db_type === "mysql";
  const config: IConfig = {
    port: parseInt(process.env.VAULT_API_PORT ?? "3100"),
    base_path: process.env.VAULT_API_BASE_PATH ?? "",
    db_type,
    db_host: mysql ? process.env.DB_HOST ?? throwError("DB_HOST env variable not set") : "",
    db_port: mysql ? parseInt(process.env.DB_PORT ?? throwError("DB_PORT env variable not set")) : 0,
    db_user: mysql ? process.env.DB_USERNAME ?? throwError("DB_USERNAME env variable not set") : "",
    db_pass: mysql ? process.env.DB_PASSWORD ?? throwError("DB_PASSWORD env variable not set") : "",
    db_name: mysql ? process.env.DB_NAME ?? throwError("DB_NAME env variable not set") : "",
    db_sqlite3_path: mysql ? "" : process.env.DB_SQLITE3_PATH ?? throwError("DB_SQLITE3_PATH env variable not set"),
  };
  return config;
};
