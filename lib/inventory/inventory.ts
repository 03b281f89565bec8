// ---------------------------------------------------------------------------------------------------------------------
// pem-inventory
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2022 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------

import type { Filename } from "../toolbox/common";
import { errorLog } from "../toolbox/debug";
import { type ArtifactCollection, type CollectOptions, collect } from "./collector";
import { type KeyExtraction, extractKey } from "./key_extractor";
import { KeyRegistry } from "./key_registry";
import { describeArtifact } from "./reporter";

export interface ReportEntry {
    description: string;
    path: Filename;
}

export type InventoryOptions = CollectOptions;

function reportFailure(filename: Filename, err: unknown): void {
    errorLog(`failed to process ${filename}:`, err instanceof Error ? err.message : String(err));
}

/**
 * the registry of every key referenced by the collected artifacts.
 * An artifact whose key cannot be extracted is left out.
 */
export function buildRegistry(collection: ArtifactCollection): KeyRegistry {
    const extractions: KeyExtraction[] = [];
    for (const [filename, artifact] of collection) {
        try {
            const extraction = extractKey(filename, artifact);
            if (extraction) {
                extractions.push(extraction);
            }
        } catch (err) {
            reportFailure(filename, err);
        }
    }
    return KeyRegistry.build(extractions);
}

export function compareEntries(a: ReportEntry, b: ReportEntry): number {
    if (a.description !== b.description) {
        return a.description < b.description ? -1 : 1;
    }
    if (a.path !== b.path) {
        return a.path < b.path ? -1 : 1;
    }
    return 0;
}

/**
 * describe every artifact of a collection, sorted by description then by path.
 */
export function describeCollection(collection: ArtifactCollection, registry: KeyRegistry): ReportEntry[] {
    const entries: ReportEntry[] = [];
    for (const [filename, artifact] of collection) {
        try {
            entries.push({ description: describeArtifact(artifact, registry), path: filename });
        } catch (err) {
            reportFailure(filename, err);
        }
    }
    return entries.sort(compareEntries);
}

/**
 * scan the given files and folders and produce the sorted inventory.
 *
 * The key registry is built from all artifacts before any of them is described,
 * so that naming and signer lookup see every key of the scan.
 */
export function buildInventory(paths: Filename[], options: InventoryOptions = {}): ReportEntry[] {
    const collection = collect(paths, options);
    const registry = buildRegistry(collection);
    return describeCollection(collection, registry);
}

export function formatEntry(entry: ReportEntry): string {
    const lines = entry.description.split("\n").map((line) => "  " + line);
    return [entry.path + ":", ...lines, ""].join("\n") + "\n";
}

export function formatReport(entries: ReportEntry[]): string {
    return entries.map(formatEntry).join("");
}
