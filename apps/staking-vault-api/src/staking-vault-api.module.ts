import { Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { TypeOrmModule, TypeOrmModuleOptions } from "@nestjs/typeorm";
import { VAULT_ENTITIES } from "../../../libs/staking-vault/src/orm/entities";
import configuration, { IConfig } from "./config/configuration";
import { StakingVaultApiController } from "./staking-vault-api.controller";
import { StakingVaultApiService } from "./staking-vault-api.service";

const IMPORTS_ARRAY = [
  ConfigModule.forRoot({
    load: [configuration],
  }),
  TypeOrmModule.forRootAsync({
    imports: [ConfigModule],
    inject: [ConfigService],
    useFactory: (configService: ConfigService<IConfig, true>): TypeOrmModuleOptions => {
      if (configService.get("db_type", { infer: true }) === "sqlite") {
        return {
          type: "sqlite",
          database: configService.get("db_sqlite3_path", { infer: true }),
          entities: VAULT_ENTITIES,
          synchronize: false,
        };
      }
      return {
        type: "mysql",
        host: configService.get("db_host", { infer: true }),
        port: configService.get("db_port", { infer: true }),
        username: configService.get("db_user", { infer: true }),
        password: configService.get("db_pass", { infer: true }),
        database: configService.get("db_name", { infer: true }),
        entities: VAULT_ENTITIES,
        synchronize: false,
      };
    },
  }),
];

@Module({
  imports: IMPORTS_ARRAY,
  controllers: [StakingVaultApiController],
  providers: [StakingVaultApiService],
})
export class StakingVaultApiModule {}
