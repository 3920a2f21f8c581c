import { DataSource } from "typeorm";
import { VAULT_ENTITIES } from "../../libs/staking-vault/src/orm/entities";

const sqliteDatabase = `:memory:`;

export async function getDataSource() {
  const dataSource = new DataSource({
    type: "sqlite",
    database: sqliteDatabase,
    entities: VAULT_ENTITIES,
    synchronize: true,
  });

  await dataSource.initialize();
  return dataSource;
}
