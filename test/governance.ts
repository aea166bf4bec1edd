import { expect } from "chai";
import { type Address, keccak256, stringToHex, zeroAddress } from "viem";

import { DAY } from "../constants/contracts";
import { OPERATION_EXPIRY, OP_EMERGENCY_PAUSE, OP_SET_FEES, TIMELOCK } from "../constants/governance";
import type { FeeToken } from "../contracts/FeeToken";
import type { Operation } from "../types/operation";
import { encodeOperation, getOperationId } from "../utils/operation-codec";
import { GENESIS, UNIT, account, deployFixture, expectRevert } from "./fixtures/token";

const propose = (token: FeeToken, creator: Address, operation: Operation) => {
  const { kind, data } = encodeOperation(operation);
  return token.createOperation(creator, kind, data);
};

describe('Governance', () => {
  const governanceFixture = () => {
    const fixture = deployFixture({ signers: [account(7), account(8)] });
    const { token, clock, owner, signer1 } = fixture;

    /** Proposes, gathers the second signature and waits out the timelock. */
    const approve = (operation: Operation) => {
      const id = propose(token, owner, operation);
      token.signOperation(signer1, id);
      clock.increase(TIMELOCK);
      return id;
    };

    return { ...fixture, approve };
  };

  describe('Proposals', () => {
    it('Creates an operation signed by its creator', () => {
      const { token, owner } = governanceFixture();
      const { kind, data } = encodeOperation({ type: "SetFees", buyFee: 10n, sellFee: 20n });

      const id = token.createOperation(owner, kind, data);

      expect(id).to.equal(getOperationId(kind, data, GENESIS));
      expect(token.getOperationInfo(id)).to.deep.equal({
        id,
        kind: OP_SET_FEES,
        data,
        createdAt: GENESIS,
        signatures: 1,
        signers: [owner],
        executed: false,
      });
      expect(token.getEvents("OperationCreated")).to.deep.equal([
        { name: "OperationCreated", args: { id, kind: "SetFees", creator: owner } },
      ]);
    });

    it('Only signers can propose', () => {
      const { token, user1 } = governanceFixture();

      expectRevert(() => propose(token, user1, { type: "EmergencyPause" }), "NotSigner");
    });

    it('Rejects unknown or malformed operations', () => {
      const { token, owner } = governanceFixture();

      expectRevert(() => token.createOperation(owner, keccak256(stringToHex("MINT")), "0x"), "UnknownOperation");
      expectRevert(() => token.createOperation(owner, OP_SET_FEES, "0x"), "UnknownOperation");
      expectRevert(() => token.createOperation(owner, OP_EMERGENCY_PAUSE, "0x01"), "UnknownOperation");
    });

    it('Rejects the same operation twice in the same second', () => {
      const { token, clock, owner, signer1 } = governanceFixture();
      const first = propose(token, owner, { type: "EmergencyPause" });

      expectRevert(() => propose(token, signer1, { type: "EmergencyPause" }), "AlreadyExists");

      clock.increase(1n);
      expect(propose(token, signer1, { type: "EmergencyPause" })).to.not.equal(first);
    });
  });

  describe('Signatures', () => {
    it('Collects one signature per signer', () => {
      const { token, owner, signer1 } = governanceFixture();
      const id = propose(token, owner, { type: "EmergencyPause" });

      token.signOperation(signer1, id);

      expect(token.getOperationInfo(id)?.signers).to.deep.equal([owner, signer1]);
      expect(token.getOperationInfo(id)?.signatures).to.equal(2);
      expect(token.getEvents("OperationSigned")).to.deep.equal([
        { name: "OperationSigned", args: { id, signer: signer1 } },
      ]);
      expectRevert(() => token.signOperation(signer1, id), "AlreadySigned");
      expectRevert(() => token.signOperation(owner, id), "AlreadySigned");
    });

    it('Stops accepting signatures once the operation expires', () => {
      const { token, clock, owner, signer1, signer2 } = governanceFixture();
      const id = propose(token, owner, { type: "EmergencyPause" });

      clock.increase(OPERATION_EXPIRY);
      token.signOperation(signer1, id);

      clock.increase(1n);
      expectRevert(() => token.signOperation(signer2, id), "Expired");
    });

    it('Rejects unknown operations and non-signers', () => {
      const { token, owner, user1 } = governanceFixture();
      const id = propose(token, owner, { type: "EmergencyPause" });

      expectRevert(() => token.signOperation(user1, id), "NotSigner");
      expectRevert(() => token.signOperation(owner, keccak256("0x01")), "NotFound");
    });
  });

  describe('Execution', () => {
    it('Needs a quorum of signatures', () => {
      const { token, clock, owner } = governanceFixture();
      const id = propose(token, owner, { type: "SetFees", buyFee: 10n, sellFee: 20n });
      clock.increase(TIMELOCK);

      expectRevert(() => token.executeOperation(owner, id), "InsufficientSignatures");
    });

    it('Waits for the timelock, then runs once', () => {
      const { token, clock, owner, signer1, signer2 } = governanceFixture();
      const id = propose(token, owner, { type: "SetFees", buyFee: 10n, sellFee: 20n });
      token.signOperation(signer1, id);

      clock.increase(TIMELOCK - 1n);
      expectRevert(() => token.executeOperation(signer2, id), "TimelockActive");

      clock.increase(1n);
      token.executeOperation(signer2, id);

      expect(token.getTokenomics().buyFee).to.equal(10n);
      expect(token.getTokenomics().sellFee).to.equal(20n);
      expect(token.getOperationInfo(id)?.executed).to.be.true;
      expect(token.getEvents("OperationExecuted")).to.deep.equal([
        { name: "OperationExecuted", args: { id, kind: "SetFees" } },
      ]);
      expectRevert(() => token.executeOperation(owner, id), "AlreadyExecuted");
      expectRevert(() => token.signOperation(signer2, id), "AlreadyExecuted");
      expectRevert(() => token.cancelOperation(owner, id), "AlreadyExecuted");
    });

    it('Leaves the operation pending when its action fails', () => {
      const { token, owner, approve } = governanceFixture();
      const id = approve({ type: "SetFees", buyFee: 60n, sellFee: 8n });

      expectRevert(() => token.executeOperation(owner, id), "FeeTooHigh");

      expect(token.getOperationInfo(id)?.executed).to.be.false;
      expect(token.getTokenomics().buyFee).to.equal(3n);
      expect(token.getEvents("OperationExecuted")).to.be.empty;
    });

    it('Replaces the treasury and exempts it from fees', () => {
      const { token, owner, user3, approve } = governanceFixture();

      token.executeOperation(owner, approve({ type: "SetTreasury", treasury: user3 }));

      expect(token.treasuryWallet).to.equal(user3);
      expect(token.isWhitelisted(user3)).to.be.true;
      expect(token.getEvents("TreasuryUpdated")).to.deep.equal([
        { name: "TreasuryUpdated", args: { account: user3 } },
      ]);
    });

    it('Updates the limits', () => {
      const { token, owner, approve } = governanceFixture();

      token.executeOperation(owner, approve({
        type: "SetLimits",
        maxTransaction: 50_000n * UNIT,
        maxWallet: 300_000n * UNIT,
        maxSell: 20_000n * UNIT,
      }));

      expect(token.getLimits()).to.deep.equal({
        maxTransactionAmount: 50_000n * UNIT,
        maxWalletAmount: 300_000n * UNIT,
        maxSellAmount: 20_000n * UNIT,
        maxDailySells: 10n,
      });
    });

    it('Opens trading for good', () => {
      const { token, owner, approve } = governanceFixture();

      token.executeOperation(owner, approve({ type: "PermanentTradingEnable" }));

      expect(token.tradingEnabled).to.be.true;
      expect(token.tradingPermanentlyEnabled).to.be.true;
      expect(token.tradingEnabledAt).to.equal(GENESIS + DAY);
      expectRevert(() => token.disableTrading(owner), "TradingPermanentlyEnabled");
    });

    it('Pauses and unpauses the token', () => {
      const { token, owner, approve } = governanceFixture();

      token.executeOperation(owner, approve({ type: "EmergencyPause" }));
      expect(token.paused).to.be.true;

      token.executeOperation(owner, approve({ type: "EmergencyUnpause" }));
      expect(token.paused).to.be.false;
    });
  });

  describe('Cancellation', () => {
    it('Removes a pending operation', () => {
      const { token, owner, signer2 } = governanceFixture();
      const id = propose(token, owner, { type: "EmergencyPause" });

      token.cancelOperation(signer2, id);

      expect(token.getOperationInfo(id)).to.be.undefined;
      expect(token.getEvents("OperationCancelled")).to.deep.equal([
        { name: "OperationCancelled", args: { id } },
      ]);
      expectRevert(() => token.signOperation(signer2, id), "NotFound");
      expectRevert(() => token.executeOperation(owner, id), "NotFound");
    });
  });

  describe('Signers', () => {
    it('Owner can add signers', () => {
      const { token, owner, signer1, signer2, user1 } = governanceFixture();

      token.addSigner(owner, user1);

      expect(token.isSigner(user1)).to.be.true;
      expect(token.getSigners()).to.deep.equal([owner, signer1, signer2, user1]);
      expect(token.getEvents("SignerAdded")).to.deep.equal([{ name: "SignerAdded", args: { signer: user1 } }]);
    });

    it('Rejects invalid signers', () => {
      const { token, owner, signer1, user1 } = governanceFixture();

      expectRevert(() => token.addSigner(owner, signer1), "SignerExists");
      expectRevert(() => token.addSigner(owner, zeroAddress), "ZeroAddress");
      expectRevert(() => token.addSigner(user1, user1), "NotOwner");
    });

    it('Caps the number of signers', () => {
      const { token, owner } = governanceFixture();
      for (let n = 0x20; n < 0x27; n++) {
        token.addSigner(owner, account(n));
      }

      expect(token.getSigners()).to.have.lengthOf(10);
      expectRevert(() => token.addSigner(owner, account(0x27)), "MaxSignersReached");
    });

    it('Owner can remove signers down to the quorum', () => {
      const { token, owner, signer1, signer2, user1 } = governanceFixture();

      token.removeSigner(owner, signer2);

      expect(token.getSigners()).to.deep.equal([owner, signer1]);
      expectRevert(() => token.removeSigner(owner, signer1), "BelowQuorum");
      expectRevert(() => token.removeSigner(owner, user1), "SignerNotFound");
    });

    it('Removed signers lose their rights', () => {
      const { token, owner, signer2 } = governanceFixture();
      const id = propose(token, owner, { type: "EmergencyPause" });
      token.removeSigner(owner, signer2);

      expectRevert(() => token.signOperation(signer2, id), "NotSigner");
      expectRevert(() => token.emergencyPause(signer2), "NotSigner");
    });
  });
});
