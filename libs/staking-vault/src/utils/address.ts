import { getAddress, isAddress, ZeroAddress } from "ethers";
import { InputValidationError } from "./error";
import { Address } from "../vault-types";

/**
 * Returns the checksummed form of `value`.
 * Rejects malformed addresses and the zero address.
 */
export function requireAddress(value: string, what: string): Address {
  if (!isAddress(value)) {
    throw new InputValidationError("InvalidAddress", `${what} is not a valid address: "${value}"`);
  }
  const address = getAddress(value);
  if (address === ZeroAddress) {
    throw new InputValidationError("ZeroAddress", `${what} must not be the zero address`);
  }
  return address;
}
