import { expect } from "chai";
import {
  combineAmountIncrease,
  combineLockupExtension,
  LockupState,
  remainingLockup,
} from "../../../libs/staking-vault/src/combiner/weighted-average";
import { MAX_UINT256, MAX_UINT64 } from "../../../libs/staking-vault/src/constants";
import { ArithmeticError, InputValidationError } from "../../../libs/staking-vault/src/utils/error";
import { days, START_TIME_SEC, tokens } from "../../utils/constants";
import { getTestFile } from "../../utils/getTestFile";

describe(`weighted-average; ${getTestFile(__filename)}`, () => {
  const T0 = START_TIME_SEC;
  const maxLockup = days(365);
  const position: LockupState = { start: T0, duration: days(30), amount: tokens(1000) };

  describe("remainingLockup", () => {
    it("should return time left until unlock", () => {
      expect(remainingLockup(100n, 50n, 120n)).to.equal(30n);
    });

    it("should return zero once matured", () => {
      expect(remainingLockup(100n, 50n, 150n)).to.equal(0n);
      expect(remainingLockup(100n, 50n, 200n)).to.equal(0n);
    });
  });

  describe("combineAmountIncrease", () => {
    it("should average the remaining lock with a fresh duration", () => {
      const result = combineAmountIncrease(position, tokens(1000), T0 + days(15));
      // merged remaining 22.5 days, duration kept at 30 days
      expect(result).to.eql({ start: T0 + days(7) + days(1) / 2n, duration: days(30) });
    });

    it("should weight by amount", () => {
      const small: LockupState = { ...position, amount: tokens(100) };
      const now = T0 + days(15);
      const result = combineAmountIncrease(small, tokens(900), now);
      // (15d * 100 + 30d * 900) / 1000 = 28.5d remaining
      expect(result.duration).to.equal(days(30));
      expect(result.start + result.duration - now).to.equal(days(28) + days(1) / 2n);
    });

    it("should relock a matured position for the weighted share of the added amount", () => {
      const now = T0 + days(40);
      const result = combineAmountIncrease(position, tokens(1000), now);
      expect(result).to.eql({ start: now - days(15), duration: days(30) });
    });

    it("should keep timing unchanged when adding at the start", () => {
      expect(combineAmountIncrease(position, tokens(500), T0)).to.eql({ start: T0, duration: days(30) });
    });

    it("should reject a non-positive added amount", () => {
      expect(() => combineAmountIncrease(position, 0n, T0)).to.throw(InputValidationError, "InvalidAmount");
    });

    it("should reject an empty position", () => {
      expect(() => combineAmountIncrease({ ...position, amount: 0n }, tokens(1), T0)).to.throw(
        InputValidationError,
        "InvalidAmount"
      );
    });

    it("should reject weighted sums outside the fixed-point range", () => {
      const huge: LockupState = { start: 0n, duration: days(30), amount: MAX_UINT256 / 2n };
      expect(() => combineAmountIncrease(huge, MAX_UINT256 / 2n, 1n)).to.throw(ArithmeticError, "Overflow");
    });

    it("should reject timestamps outside the fixed-point range", () => {
      expect(() => combineAmountIncrease({ ...position, start: MAX_UINT64 + 1n }, tokens(1), T0)).to.throw(
        ArithmeticError,
        "Overflow"
      );
    });
  });

  describe("combineLockupExtension", () => {
    it("should extend from the remaining lock and restart", () => {
      const now = T0 + days(15);
      expect(combineLockupExtension(position, days(30), now, maxLockup)).to.eql({ start: now, duration: days(45) });
    });

    it("should keep the duration when the extended lock stays below it", () => {
      const long: LockupState = { ...position, duration: days(90) };
      const now = T0 + days(80);
      const result = combineLockupExtension(long, days(7), now, maxLockup);
      expect(result).to.eql({ start: now + days(17) - days(90), duration: days(90) });
    });

    it("should cap at the maximum lockup", () => {
      const capped: LockupState = { ...position, duration: days(365) };
      expect(combineLockupExtension(capped, days(30), T0, maxLockup)).to.eql({ start: T0, duration: days(365) });
    });

    it("should never shorten the remaining lock when the cap is below it", () => {
      const long: LockupState = { ...position, duration: days(90) };
      const now = T0 + days(30);
      const result = combineLockupExtension(long, days(7), now, days(30));
      expect(result).to.eql({ start: T0, duration: days(90) });
    });

    it("should reject a non-positive extension", () => {
      expect(() => combineLockupExtension(position, 0n, T0, maxLockup)).to.throw(
        InputValidationError,
        "InvalidLockupPeriod"
      );
    });
  });

  describe("order sensitivity", () => {
    const now = T0 + days(15);

    it("should give a shorter lock when extending before adding", () => {
      const extended = combineLockupExtension(position, days(30), now, maxLockup);
      const extendThenAdd = combineAmountIncrease({ ...extended, amount: tokens(1000) }, tokens(1000), now);

      const added = combineAmountIncrease(position, tokens(1000), now);
      const addThenExtend = combineLockupExtension({ ...added, amount: tokens(2000) }, days(30), now, maxLockup);

      expect(extendThenAdd).to.eql({ start: now, duration: days(45) });
      expect(addThenExtend).to.eql({ start: now, duration: days(52) + days(1) / 2n });
    });
  });
});
