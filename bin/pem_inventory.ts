#!/usr/bin/env node
import { hideBin } from "yargs/helpers";

import { main } from "../lib/cli/pem_inventory";

main(hideBin(process.argv))
    .then((exitCode) => {
        process.exitCode = exitCode;
    })
    .catch((err: Error) => {
        console.log("err = ", err.message);
        process.exitCode = 1;
    });
