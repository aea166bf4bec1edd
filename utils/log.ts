import { VERBOSE } from "../constants/contracts";

export class Log {
    static info = (...args: unknown[]) => {
        console.log(...args);
    }

    static warn = (...args: unknown[]) => {
        console.warn(...args);
    }

    /** Only printed when VERBOSE=true */
    static dev = (...args: unknown[]) => {
        if (VERBOSE) {
            console.log(`[${new Date().toISOString()}]`, ...args);
        }
    }
}
