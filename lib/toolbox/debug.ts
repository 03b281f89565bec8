import { g_config } from "./config";

export const doDebug = !!process.env.PEMINVENTORYDEBUG;
export const displayError = true;

export function debugLog(...args: unknown[]): void {
    // istanbul ignore next
    if (doDebug) {
        console.log(...args);
    }
}

export function warningLog(...args: unknown[]): void {
    if (!g_config.silent) {
        console.log(...args);
    }
}

export function errorLog(...args: unknown[]): void {
    // istanbul ignore next
    if (displayError) {
        console.error(...args);
    }
}
