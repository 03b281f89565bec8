// ---------------------------------------------------------------------------------------------------------------------
// pem-inventory
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2022 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";

import type { Filename } from "../toolbox/common";
import { debugLog, warningLog } from "../toolbox/debug";
import type { Artifact } from "./artifact";
import { classify } from "./classifier";

/**
 * files that are expected in a CA folder but hold no PEM artifact
 * (openssl ca database, serial counters, passphrase ...)
 */
export const expectedNonArtifactFiles: ReadonlySet<string> = new Set([
    "inventory.txt",
    "ca.pass",
    "serial",
    "serial.old",
    "index.txt",
    "index.txt.attr",
    "index.txt.old",
    "index.txt.attr.old",
    "crlnumber",
    "crlnumber.old"
]);

export interface CollectOptions {
    /** receives one message per file that could not be interpreted, defaults to warningLog */
    warn?: (message: string) => void;
}

/**
 * the artifacts found while scanning, in discovery order.
 */
export class ArtifactCollection implements Iterable<[Filename, Artifact]> {
    readonly #artifacts: ReadonlyMap<Filename, Artifact>;

    constructor(artifacts: ReadonlyMap<Filename, Artifact>) {
        this.#artifacts = artifacts;
    }

    public get size(): number {
        return this.#artifacts.size;
    }

    public get(filename: Filename): Artifact | undefined {
        return this.#artifacts.get(filename);
    }

    public paths(): Filename[] {
        return [...this.#artifacts.keys()];
    }

    public entries(): IterableIterator<[Filename, Artifact]> {
        return this.#artifacts.entries();
    }

    public [Symbol.iterator](): IterableIterator<[Filename, Artifact]> {
        return this.entries();
    }
}

export function unrecognizedFileMessage(filename: Filename): string {
    return `WARNING: file ${filename} could not be interpreted`;
}

interface Scan {
    found: Map<Filename, Artifact>;
    /** resolved names of the files already read */
    visited: Set<string>;
    warn: (message: string) => void;
}

function collectFile(filename: Filename, scan: Scan): void {
    const resolved = path.resolve(filename);
    if (scan.visited.has(resolved)) {
        debugLog("already visited", filename);
        return;
    }
    scan.visited.add(resolved);

    const contents = fs.readFileSync(filename, "utf8");
    const artifact = classify(contents);
    if (artifact) {
        debugLog("found", artifact.kind, "in", filename);
        scan.found.set(filename, artifact);
        return;
    }
    if (!expectedNonArtifactFiles.has(path.basename(filename))) {
        scan.warn(unrecognizedFileMessage(filename));
    }
}

function collectPath(filename: Filename, scan: Scan): void {
    const stat = fs.statSync(filename);
    if (stat.isDirectory()) {
        for (const file of fs.readdirSync(filename)) {
            collectPath(path.join(filename, file), scan);
        }
    } else if (stat.isFile()) {
        collectFile(filename, scan);
    } else {
        debugLog("skipping", filename, ": neither a file nor a folder");
    }
}

/**
 * walk the given files and folders (recursively) and classify every file found.
 *
 * Files that cannot be interpreted are reported through `options.warn`, unless their name
 * is one of {@link expectedNonArtifactFiles}. A file reached twice is read once.
 * Errors raised while reading the file system are not caught.
 */
export function collect(paths: Filename[], options: CollectOptions = {}): ArtifactCollection {
    const scan: Scan = {
        found: new Map<Filename, Artifact>(),
        visited: new Set<string>(),
        warn: options.warn ?? ((message: string) => warningLog(message))
    };
    for (const p of paths) {
        collectPath(p, scan);
    }
    return new ArtifactCollection(scan.found);
}
