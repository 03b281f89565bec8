// ---------------------------------------------------------------------------------------------------------------------
// pem-inventory
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2022 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------
import chalk from "chalk";
import yargs from "yargs";

import type { Filename } from "../toolbox/common";
import { errorLog } from "../toolbox/debug";
import { buildInventory, formatReport } from "../inventory/inventory";

const epilog = "Each file is classified by its first line; keys shared by several files are named once.";

export type Writer = (text: string) => void;

function toPaths(value: string | string[] | undefined): Filename[] {
    if (value === undefined) {
        return [];
    }
    return Array.isArray(value) ? value : [value];
}

function on_error(err: unknown): number {
    errorLog(chalk.redBright("ERROR : ") + (err instanceof Error ? err.message : String(err)));
    return 1;
}

/**
 * scan the given paths and write the inventory.
 * Returns the process exit code: 1 if the scan failed, in which case no report is written.
 */
export function runInventory(paths: Filename[], write: Writer = (text) => process.stdout.write(text)): number {
    try {
        const entries = buildInventory(paths);
        write(formatReport(entries));
        return 0;
    } catch (err) {
        return on_error(err);
    }
}

/**
 * command line entry point, `argv` being the arguments without the node executable and script.
 */
export async function main(argv: string[], write?: Writer): Promise<number> {
    let exitCode = 0;
    await yargs(argv)
        .scriptName("pem-inventory")
        .command(
            "$0 <paths..>",
            "list the certificates, requests, CRLs and RSA keys found in the given files and folders",
            (y) =>
                y.positional("paths", {
                    describe: "files or folders to scan (folders are scanned recursively)",
                    type: "string",
                    array: true,
                    demandOption: true
                }),
            (args) => {
                exitCode = runInventory(toPaths(args.paths), write);
            }
        )
        .strict()
        .wrap(132)
        .help("help")
        .epilog(epilog)
        .parseAsync();
    return exitCode;
}
