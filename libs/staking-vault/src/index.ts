export * from "./constants";
export * from "./vault-types";
export * from "./utils/error";
export * from "./utils/Clock";
export * from "./utils/address";
export { getLogger, logError } from "./utils/logger";
export { bigIntToDecimalString } from "./utils/big-number-serialization";
export * from "./multiplier/MultiplierTable";
export * from "./multiplier/multiplier-calculation";
export * from "./combiner/weighted-average";
export * from "./configs/vault-config";
export * from "./orm/entities";
export * from "./events/VaultEvents";
export * from "./token/ITokenLedger";
export * from "./token/DatabaseTokenLedger";
export * from "./PositionLedger";
export * from "./StakingVault";
export * from "./VaultQueries";
