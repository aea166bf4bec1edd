import { type Address, type Hex, zeroAddress } from "viem";
import { MAX_SIGNERS, OPERATION_EXPIRY, QUORUM, TIMELOCK } from "../constants/governance";
import type { Operation, OperationInfo, OperationType } from "../types/operation";
import { decodeOperation, getOperationId } from "../utils/operation-codec";
import { Log } from "../utils/log";
import { revert } from "./errors";
import type { Journal } from "./Journal";
import { type EventSink, StatefulModule } from "./StatefulModule";

interface OperationRecord {
    kind: Hex;
    data: Hex;
    type: OperationType;
    createdAt: bigint;
    signers: Address[];
    executed: boolean;
}

interface GovernanceState {
    signers: Address[];
    operations: Map<Hex, OperationRecord>;
}

export type OperationHandler = (operation: Operation) => void;

/**
 * Multi-signature proposals behind a timelock. An operation needs QUORUM
 * distinct signatures and TIMELOCK seconds of age before it can run, and runs
 * at most once.
 */
export class Governance extends StatefulModule<GovernanceState> {
    constructor(
        journal: Journal,
        private readonly handler: OperationHandler,
        private readonly emit: EventSink,
        signers: Address[],
    ) {
        super(journal, { signers: [...signers], operations: new Map() });
    }

    isSigner(account: Address) {
        return this.state.signers.includes(account);
    }

    signers(): Address[] {
        return [...this.state.signers];
    }

    requireSigner(account: Address) {
        if (!this.isSigner(account)) revert("NotSigner");
    }

    addSigner(signer: Address) {
        if (signer === zeroAddress) revert("ZeroAddress");
        if (this.isSigner(signer)) revert("SignerExists");
        if (this.state.signers.length >= MAX_SIGNERS) revert("MaxSignersReached");
        this.journal.push(this.state.signers, signer);
        this.emit({ name: "SignerAdded", args: { signer } });
    }

    removeSigner(signer: Address) {
        if (!this.isSigner(signer)) revert("SignerNotFound");
        if (this.state.signers.length - 1 < QUORUM) revert("BelowQuorum");
        this.update("signers", this.state.signers.filter((s) => s !== signer));
        this.emit({ name: "SignerRemoved", args: { signer } });
    }

    create(caller: Address, kind: Hex, data: Hex, now: bigint): Hex {
        this.requireSigner(caller);
        const { type } = decodeOperation(kind, data);

        const id = getOperationId(kind, data, now);
        if (this.state.operations.has(id)) revert("AlreadyExists");

        this.journal.set(this.state.operations, id, { kind, data, type, createdAt: now, signers: [caller], executed: false });
        this.emit({ name: "OperationCreated", args: { id, kind: type, creator: caller } });
        return id;
    }

    sign(caller: Address, id: Hex, now: bigint) {
        this.requireSigner(caller);
        const operation = this.pending(id);
        if (operation.signers.includes(caller)) revert("AlreadySigned");
        if (now > operation.createdAt + OPERATION_EXPIRY) revert("Expired");

        this.journal.push(operation.signers, caller);
        this.emit({ name: "OperationSigned", args: { id, signer: caller } });
    }

    execute(caller: Address, id: Hex, now: bigint) {
        this.requireSigner(caller);
        const operation = this.pending(id);
        if (operation.signers.length < QUORUM) revert("InsufficientSignatures");
        if (now < operation.createdAt + TIMELOCK) revert("TimelockActive");

        const decoded = decodeOperation(operation.kind, operation.data);
        this.handler(decoded);
        this.journal.assign(operation, "executed", true);

        Log.dev(`Operation ${id} (${decoded.type}) executed by ${caller}`);
        this.emit({ name: "OperationExecuted", args: { id, kind: decoded.type } });
    }

    cancel(caller: Address, id: Hex) {
        this.requireSigner(caller);
        this.pending(id);
        this.journal.delete(this.state.operations, id);
        this.emit({ name: "OperationCancelled", args: { id } });
    }

    info(id: Hex): OperationInfo | undefined {
        const operation = this.state.operations.get(id);
        if (!operation) return undefined;
        return {
            id,
            kind: operation.kind,
            data: operation.data,
            createdAt: operation.createdAt,
            signatures: operation.signers.length,
            signers: [...operation.signers],
            executed: operation.executed,
        };
    }

    private pending(id: Hex) {
        const operation = this.state.operations.get(id);
        if (!operation) return revert("NotFound");
        if (operation.executed) revert("AlreadyExecuted");
        return operation;
    }
}
