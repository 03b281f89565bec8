import { type Artifact, isSigned } from "./artifact";
import { verifySignature } from "./decoder";
import type { KeyRegistry } from "./key_registry";

/** displayed when no registered key validates a signature */
export const unknownSigner = "???";

/**
 * the display name of the first registered key (in discovery order) whose signature
 * matches the artifact, or {@link unknownSigner}. Keys carry no signature,
 * and a signature made with an algorithm we cannot check matches no key.
 */
export function signedBy(artifact: Artifact, registry: KeyRegistry): string {
    if (!isSigned(artifact) || !artifact.signed) {
        return unknownSigner;
    }
    const signed = artifact.signed;
    for (const key of registry.orderedKeys) {
        if (verifySignature(signed, key)) {
            return registry.nameOf(key) ?? unknownSigner;
        }
    }
    return unknownSigner;
}
