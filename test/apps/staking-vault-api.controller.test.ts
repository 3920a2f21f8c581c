import { BadRequestException, InternalServerErrorException, NotFoundException } from "@nestjs/common";
import { ExecutionContextHost } from "@nestjs/core/helpers/execution-context-host";
import FakeTimers from "@sinonjs/fake-timers";
import { expect, use as useChai } from "chai";
import chaiAsPromised from "chai-as-promised";
import { lastValueFrom, of } from "rxjs";
import sinon from "sinon";
import { StakingVaultApiController } from "../../apps/staking-vault-api/src/staking-vault-api.controller";
import { StakingVaultApiService } from "../../apps/staking-vault-api/src/staking-vault-api.service";
import { BigIntInterceptor } from "../../apps/staking-vault-api/src/utils/BigIntInterceptor";
import { ALICE, BOB, days, QUALITY_CONTROL, TREASURY, tokens } from "../utils/constants";
import { getTestFile } from "../utils/getTestFile";
import { advance, createTestVault, fund, installClock, TestVault } from "../utils/vault-fixtures";
useChai(chaiAsPromised);

describe(`StakingVaultApiController; ${getTestFile(__filename)}`, () => {
  describe("with a vault database", () => {
    let clock: FakeTimers.InstalledClock;
    let tv: TestVault;
    let controller: StakingVaultApiController;

    beforeEach(async () => {
      clock = installClock();
      tv = await createTestVault();
      await fund(tv, ALICE, tokens(1000));
      await tv.vault.stake(ALICE, tokens(1000), days(30));
      controller = new StakingVaultApiController(new StakingVaultApiService(tv.dataSource));
    });

    afterEach(async () => {
      await tv.dataSource.destroy();
      clock.uninstall();
    });

    it("should return the vault state", async () => {
      const state = await controller.getVault();
      expect(state.totalStaked).to.equal(tokens(1000));
      expect(state.totalInCooldown).to.equal(0n);
      expect(state.maximumStakeAmount).to.equal(tokens(10000));
      expect(state.treasury).to.equal(TREASURY);
      expect(state.qualityControl).to.equal(QUALITY_CONTROL);
      expect(state.paused).to.be.false;
      expect(state.consistent).to.be.true;
    });

    it("should return a user summary", async () => {
      advance(clock, days(10));
      const summary = await controller.getUserSummary(ALICE.toLowerCase());
      expect(summary.user).to.equal(ALICE);
      expect(summary.totalLocked).to.equal(tokens(1000));
      expect(summary.timeUntilUnlock).to.equal(days(20));
      expect(summary.effectiveMultiplier).to.equal(11000n);
    });

    it("should report whether a user has an active stake", async () => {
      expect(await controller.hasActiveStake(ALICE)).to.eql({ user: ALICE, hasActiveStake: true });
      expect(await controller.hasActiveStake(BOB)).to.eql({ user: BOB, hasActiveStake: false });
    });

    it("should answer malformed addresses with 400", async () => {
      await expect(controller.getUserSummary("not-an-address")).to.be.rejectedWith(BadRequestException);
    });
  });

  describe("error mapping", () => {
    it("should answer an uninitialized vault with 404", async () => {
      const empty = await createTestVault({ initialize: false });
      try {
        const controller = new StakingVaultApiController(new StakingVaultApiService(empty.dataSource));
        await expect(controller.getVault()).to.be.rejectedWith(NotFoundException);
      } finally {
        await empty.dataSource.destroy();
      }
    });

    it("should answer unexpected failures with 500", async () => {
      const serviceMock = sinon.createStubInstance(StakingVaultApiService);
      serviceMock.getUserSummary.rejects(new Error("connection lost"));
      const controller = new StakingVaultApiController(serviceMock);
      await expect(controller.getUserSummary(ALICE)).to.be.rejectedWith(InternalServerErrorException);
    });
  });

  describe("BigIntInterceptor", () => {
    it("should serialize bigints as decimal strings", async () => {
      const interceptor = new BigIntInterceptor();
      const result = await lastValueFrom(
        interceptor.intercept(new ExecutionContextHost([]), {
          handle: () => of({ totalStaked: tokens(1), lockupPeriods: [days(30)], paused: false, user: ALICE }),
        })
      );
      expect(result).to.eql({
        totalStaked: "1000000000000000000",
        lockupPeriods: ["2592000"],
        paused: false,
        user: ALICE,
      });
    });
  });
});
