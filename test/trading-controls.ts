import { expect } from "chai";

import { DAY } from "../constants/contracts";
import { GENESIS, UNIT, deployFixture, expectRevert, tradingFixture } from "./fixtures/token";

describe('Trading controls', () => {
  describe('Anti-bot window', () => {
    it('Blocks user transfers during the first minute of trading', () => {
      const { token, clock, owner, user1, user2 } = deployFixture();
      token.enableTrading(owner);
      token.transfer(owner, user1, 1000n * UNIT);

      clock.increase(30n);
      expectRevert(() => token.transfer(user1, user2, UNIT), "AntiBotRestricted");

      clock.increase(31n);
      expect(token.transfer(user1, user2, UNIT)).to.equal(UNIT);
      expect(clock.now()).to.equal(GENESIS + 61n);
    });
  });

  describe('Cooldown', () => {
    it('Spaces out trades of the same account by a minute', () => {
      const { token, clock, owner, user1, user2, user3 } = tradingFixture();
      token.transfer(owner, user1, 1000n * UNIT);
      clock.increase(61n);

      token.transfer(user1, user2, 10n * UNIT);

      clock.increase(30n);
      expectRevert(() => token.transfer(user1, user3, 10n * UNIT), "CooldownActive");

      clock.increase(30n);
      expect(token.transfer(user1, user3, 10n * UNIT)).to.equal(10n * UNIT);
    });

    it('Applies to the buyer on purchases', () => {
      const { token, owner, user1, pair } = tradingFixture();
      token.transfer(owner, pair, 1000n * UNIT);

      token.transfer(pair, user1, 10n * UNIT);

      expectRevert(() => token.transfer(pair, user1, 10n * UNIT), "CooldownActive");
    });
  });

  describe('Limits', () => {
    it('Caps the amount of a single transfer between users', () => {
      const { token, clock, owner, user1, user2 } = tradingFixture();
      token.setLimits(owner, 1000n * UNIT, 200_000n * UNIT, 1000n * UNIT);
      token.transfer(owner, user1, 1000n * UNIT);
      token.transfer(owner, user1, 1000n * UNIT);
      clock.increase(61n);

      expectRevert(() => token.transfer(user1, user2, 1001n * UNIT), "ExceedsMaxTransaction");
      expect(token.transfer(user1, user2, 1000n * UNIT)).to.equal(1000n * UNIT);
    });

    it('Caps the balance a wallet can reach', () => {
      const { token, clock, owner, user1, user2 } = tradingFixture();
      token.setLimits(owner, 100_000n * UNIT, 1000n * UNIT, 100_000n * UNIT);
      token.transfer(owner, user1, 900n * UNIT);
      token.transfer(owner, user2, 200n * UNIT);
      clock.increase(61n);

      expectRevert(() => token.transfer(user2, user1, 200n * UNIT), "ExceedsMaxWallet");
      expect(token.transfer(user2, user1, 100n * UNIT)).to.equal(100n * UNIT);
      expect(token.balanceOf(user1)).to.equal(1000n * UNIT);
    });

    it('Holds wallets to 2% of the supply whatever the configured limit', () => {
      const { token, owner, user1 } = tradingFixture();
      token.setLimits(owner, 100_000n * UNIT, 500_000n * UNIT, 100_000n * UNIT);
      token.transfer(owner, user1, 100_000n * UNIT);
      token.transfer(owner, user1, 100_000n * UNIT);

      expectRevert(() => token.transfer(owner, user1, UNIT), "ExceedsMaxWallet");
      expect(token.balanceOf(user1)).to.equal(200_000n * UNIT);
    });

    it('Caps the amount of a single sale', () => {
      const { token, clock, owner, user1, pair } = tradingFixture();
      token.setLimits(owner, 100_000n * UNIT, 200_000n * UNIT, 50_000n * UNIT);
      token.transfer(owner, user1, 60_000n * UNIT);
      clock.increase(61n);

      expectRevert(() => token.transfer(user1, pair, 50_001n * UNIT), "ExceedsMaxSell");
      expect(token.transfer(user1, pair, 50_000n * UNIT)).to.equal(49_600n * UNIT);
    });

    it('Limits the number of sales per day', () => {
      const { token, clock, owner, user1, pair } = tradingFixture();
      token.setMaxDailySells(owner, 2n);
      token.transfer(owner, user1, 1000n * UNIT);

      clock.increase(61n);
      token.transfer(user1, pair, 10n * UNIT);
      clock.increase(61n);
      token.transfer(user1, pair, 10n * UNIT);
      clock.increase(61n);
      expectRevert(() => token.transfer(user1, pair, 10n * UNIT), "DailySellLimitExceeded");
      expect(token.sellsToday(user1)).to.equal(2n);

      clock.increase(DAY);
      expect(token.sellsToday(user1)).to.equal(0n);
      token.transfer(user1, pair, 10n * UNIT);
      expect(token.sellsToday(user1)).to.equal(1n);
    });
  });

  describe('Access lists', () => {
    it('Whitelisted recipients bypass the trading gate', () => {
      const { token, owner, user1, user2 } = deployFixture();
      token.setWhitelist(owner, user1, true);
      token.transfer(owner, user2, UNIT);

      expect(token.transfer(user2, user1, UNIT)).to.equal(UNIT);
    });

    it('Blacklisted senders cannot transfer', () => {
      const { token, owner, user1 } = tradingFixture();
      token.transfer(owner, user1, UNIT);
      token.setBlacklist(owner, user1, true);

      expect(token.isBlacklisted(user1)).to.be.true;
      expectRevert(() => token.transfer(user1, owner, UNIT), "Blacklisted");
    });
  });

  describe('Emergency pause', () => {
    it('Signers can pause and unpause transfers', () => {
      const { token, owner, user1 } = tradingFixture();

      token.emergencyPause(owner);
      expect(token.paused).to.be.true;
      expectRevert(() => token.transfer(owner, user1, UNIT), "Paused");

      token.emergencyUnpause(owner);
      expect(token.transfer(owner, user1, UNIT)).to.equal(UNIT);
      expect(token.getEvents("EmergencyPause")).to.deep.equal([
        { name: "EmergencyPause", args: { paused: true } },
        { name: "EmergencyPause", args: { paused: false } },
      ]);
    });

    it('Rejects pausing twice or unpausing when running', () => {
      const { token, owner } = deployFixture();

      expectRevert(() => token.emergencyUnpause(owner), "NotPaused");
      token.emergencyPause(owner);
      expectRevert(() => token.emergencyPause(owner), "AlreadyPaused");
    });

    it('Only signers can pause', () => {
      const { token, user1 } = deployFixture();

      expectRevert(() => token.emergencyPause(user1), "NotSigner");
    });
  });
});
