import FakeTimers from "@sinonjs/fake-timers";
import { expect, use as useChai } from "chai";
import chaiAsPromised from "chai-as-promised";
import { StatePreconditionError } from "../../../libs/staking-vault/src/utils/error";
import { ALICE, BOB, days, tokens } from "../../utils/constants";
import { getTestFile } from "../../utils/getTestFile";
import { advance, createTestVault, fund, installClock, TestVault } from "../../utils/vault-fixtures";
useChai(chaiAsPromised);

describe(`VaultQueries; ${getTestFile(__filename)}`, () => {
  let clock: FakeTimers.InstalledClock;
  let tv: TestVault;

  beforeEach(async () => {
    clock = installClock();
    tv = await createTestVault();
    await fund(tv, ALICE, tokens(1000));
  });

  afterEach(async () => {
    await tv.dataSource.destroy();
    clock.uninstall();
  });

  it("should summarize a position with an open early unstake", async () => {
    await tv.vault.stake(ALICE, tokens(1000), days(90));
    advance(clock, days(10));
    await tv.vault.initiateEarlyUnstake(ALICE, tokens(400));
    advance(clock, days(1));

    expect(await tv.queries.getUserStakingSummary(ALICE)).to.eql({
      user: ALICE,
      hasActiveStake: true,
      totalStaked: tokens(1000),
      totalUnlocked: 0n,
      totalLocked: tokens(600),
      totalInCooldown: 0n,
      totalInEarlyCooldown: tokens(400),
      totalReadyForUnstake: 0n,
      totalReadyForEarlyUnstake: 0n,
      effectiveMultiplier: 11500n,
      effectiveLockupPeriod: days(90),
      timeUntilUnlock: days(79),
      timeUntilCooldownComplete: 0n,
      timeUntilEarlyUnstakeComplete: days(1),
    });
  });

  it("should report a matured position as unlocked", async () => {
    await tv.vault.stake(ALICE, tokens(1000), days(30));
    advance(clock, days(31));

    expect(await tv.queries.getTotalUnlocked(ALICE)).to.equal(tokens(1000));
    expect(await tv.queries.getTotalLocked(ALICE)).to.equal(0n);
    expect(await tv.queries.getTimeUntilUnlock(ALICE)).to.equal(0n);
    expect(await tv.queries.getEffectiveLockupPeriod(ALICE)).to.equal(days(30));
  });

  it("should return zeros for a user without a position", async () => {
    const summary = await tv.queries.getUserStakingSummary(BOB);
    expect(summary.hasActiveStake).to.be.false;
    expect(summary.totalStaked).to.equal(0n);
    expect(summary.totalUnlocked).to.equal(0n);
    expect(summary.totalLocked).to.equal(0n);
    expect(summary.effectiveMultiplier).to.equal(0n);
    expect(summary.timeUntilUnlock).to.equal(0n);
  });

  it("should separate per-user and system totals", async () => {
    await fund(tv, BOB, tokens(2000));
    await tv.vault.stake(ALICE, tokens(1000), days(30));
    await tv.vault.stake(BOB, tokens(2000), days(30));

    expect(await tv.queries.getTotalStaked(ALICE)).to.equal(tokens(1000));
    expect(await tv.queries.getTotalStaked(BOB)).to.equal(tokens(2000));
    expect(await tv.queries.getTotalStaked()).to.equal(tokens(3000));
  });

  it("should filter events by user", async () => {
    await fund(tv, BOB, tokens(1000));
    await tv.vault.stake(ALICE, tokens(1000), days(30));
    await tv.vault.stake(BOB, tokens(1000), days(90));

    expect((await tv.queries.getEvents(BOB)).map(e => [e.name, e.user])).to.eql([["Staked", BOB]]);
    expect((await tv.queries.getEvents()).map(e => e.name)).to.eql(["Initialized", "Staked", "Staked"]);
  });

  it("should fail system reads before initialization", async () => {
    const empty = await createTestVault({ initialize: false });
    try {
      await expect(empty.queries.getVaultSettings()).to.be.rejectedWith(StatePreconditionError, "NotInitialized");
      expect(await empty.queries.hasActiveStake(ALICE)).to.be.false;
    } finally {
      await empty.dataSource.destroy();
    }
  });
});
