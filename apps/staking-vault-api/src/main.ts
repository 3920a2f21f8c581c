import "reflect-metadata";
import * as dotenv from "dotenv";
dotenv.config();

import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import helmet from "helmet";
import { LogLevel, Logger } from "@nestjs/common";
import { StakingVaultApiModule } from "./staking-vault-api.module";
import { BigIntInterceptor } from "./utils/BigIntInterceptor";

async function bootstrap() {
  let logLevels: LogLevel[] = ["log", "warn", "error"];
  if (process.env.LOG_LEVEL === "debug") {
    logLevels = ["verbose"];
  }

  const app = await NestFactory.create(StakingVaultApiModule, { logger: logLevels });
  app.enableShutdownHooks();
  app.useGlobalInterceptors(new BigIntInterceptor());
  app.use(helmet());
  const basePath = process.env.VAULT_API_BASE_PATH ?? "";

  const config = new DocumentBuilder()
    .setTitle("Staking vault API")
    .setDescription("Read-only view of staking positions, multipliers and cooldowns for reward distributors")
    .setBasePath(basePath)
    .setVersion("1.0")
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup(`${basePath}/api-doc`, app, document);

  app.setGlobalPrefix(basePath);

  const PORT = process.env.VAULT_API_PORT ? parseInt(process.env.VAULT_API_PORT) : 3100;
  const logger = new Logger();
  logger.log(`Staking vault API is available on PORT: ${PORT}`);
  logger.log(`Open link: http://localhost:${PORT}/api-doc`);
  await app.listen(PORT);
}

void bootstrap();
