// ---------------------------------------------------------------------------------------------------------------------
// pem-inventory
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2022 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------

import type { PublicKeyMaterial } from "./artifact";
import type { KeyExtraction, NamePriority } from "./key_extractor";

/**
 * the label elected for a distinct key.
 */
export interface KeyRecord {
    priority: NamePriority;
    label: string;
    key: PublicKeyMaterial;
}

/**
 * a KeyRecord once its label has been made unique across the registry.
 */
export interface NamedKeyRecord extends KeyRecord {
    /** the unique label, possibly with a " (n)" suffix */
    name: string;
    /** the display name, `key<name>` */
    displayName: string;
}

interface Slot {
    /** position of the first extraction seen for this key */
    firstSeen: number;
    record: KeyRecord;
}

export function keyDisplayName(name: string): string {
    return "key<" + name + ">";
}

/**
 * The set of distinct public keys found in a scan, with a canonical name for each.
 *
 * Keys are compared by their PEM encoding. When several artifacts share a key, the label
 * with the lowest priority number wins; on a tie the artifact seen last wins. Keys keep the
 * position of their first appearance, whatever label they end up with.
 *
 * A registry is immutable once built.
 */
export class KeyRegistry {
    /** distinct keys, in the order they were first seen */
    public readonly orderedKeys: ReadonlyArray<PublicKeyMaterial>;

    readonly #records: ReadonlyArray<NamedKeyRecord>;
    readonly #byPem: ReadonlyMap<string, NamedKeyRecord>;

    private constructor(records: NamedKeyRecord[]) {
        this.#records = records;
        this.#byPem = new Map(records.map((r) => [r.key.pem, r]));
        this.orderedKeys = records.map((r) => r.key);
    }

    public static build(extractions: Iterable<KeyExtraction>): KeyRegistry {
        const slots = new Map<string, Slot>();
        let position = 0;
        for (const { key, priority, label } of extractions) {
            const slot = slots.get(key.pem);
            if (!slot) {
                slots.set(key.pem, { firstSeen: position++, record: { priority, label, key } });
            } else if (priority <= slot.record.priority) {
                slot.record = { priority, label, key };
            }
        }

        const ordered = [...slots.values()].sort((a, b) => a.firstSeen - b.firstSeen);

        const taken = new Set<string>();
        const records: NamedKeyRecord[] = [];
        for (const { record } of ordered) {
            const name = disambiguate(record.label, taken);
            taken.add(name);
            records.push({ ...record, name, displayName: keyDisplayName(name) });
        }
        return new KeyRegistry(records);
    }

    public get size(): number {
        return this.#records.length;
    }

    public has(key: PublicKeyMaterial): boolean {
        return this.#byPem.has(key.pem);
    }

    /**
     * the display name (`key<...>`) of a key, or undefined if the key was never registered
     */
    public nameOf(key: PublicKeyMaterial): string | undefined {
        return this.#byPem.get(key.pem)?.displayName;
    }

    public records(): ReadonlyArray<NamedKeyRecord> {
        return this.#records;
    }
}

function disambiguate(label: string, taken: ReadonlySet<string>): string {
    if (!taken.has(label)) {
        return label;
    }
    let n = 2;
    while (taken.has(`${label} (${n})`)) {
        n++;
    }
    return `${label} (${n})`;
}
