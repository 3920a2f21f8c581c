import { parseUnits } from "ethers";
import { ONE_DAY_SEC } from "../../libs/staking-vault/src/constants";

// Digit-only addresses are their own checksummed form.
export const ADMIN = "0x1000000000000000000000000000000000000001";
export const TREASURY = "0x1000000000000000000000000000000000000002";
export const QUALITY_CONTROL = "0x1000000000000000000000000000000000000003";
export const ALICE = "0x2000000000000000000000000000000000000001";
export const BOB = "0x2000000000000000000000000000000000000002";
export const CAROL = "0x2000000000000000000000000000000000000003";
export const OUTSIDER = "0x3000000000000000000000000000000000000001";

export const START_TIME_SEC = 1_700_000_000n;

export function tokens(amount: string | number): bigint {
  return parseUnits(amount.toString(), 18);
}

export function days(count: number): bigint {
  return BigInt(count) * ONE_DAY_SEC;
}
