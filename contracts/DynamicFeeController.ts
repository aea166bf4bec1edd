import {
    BASE_MULTIPLIER,
    MAX_DYNAMIC_FEE_MULTIPLIER,
    MULTIPLIER_STEP,
} from "../constants/contracts";
import type { Journal } from "./Journal";
import { type EventSink, StatefulModule } from "./StatefulModule";

interface MultiplierState {
    multiplier: bigint;
}

export class DynamicFeeController extends StatefulModule<MultiplierState> {
    constructor(
        journal: Journal,
        private readonly volumeThreshold: bigint,
        private readonly emit: EventSink,
    ) {
        super(journal, { multiplier: BASE_MULTIPLIER });
    }

    get multiplier() {
        return this.state.multiplier;
    }

    /**
     * Step function of the day's volume: +20 per full threshold once the
     * threshold is crossed, capped at MAX_DYNAMIC_FEE_MULTIPLIER.
     */
    static multiplierFor(volume: bigint, threshold: bigint) {
        if (volume <= threshold) return BASE_MULTIPLIER;
        const stepped = BASE_MULTIPLIER + (volume / threshold) * MULTIPLIER_STEP;
        return stepped > MAX_DYNAMIC_FEE_MULTIPLIER ? MAX_DYNAMIC_FEE_MULTIPLIER : stepped;
    }

    refresh(volume: bigint) {
        const multiplier = DynamicFeeController.multiplierFor(volume, this.volumeThreshold);
        if (multiplier !== this.state.multiplier) {
            this.update("multiplier", multiplier);
            this.emit({ name: "MultiplierUpdated", args: { multiplier } });
        }
        return multiplier;
    }
}
