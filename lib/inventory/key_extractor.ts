import type { Filename } from "../toolbox/common";
import type { Artifact, PublicKeyMaterial } from "./artifact";

/**
 * which label wins when several artifacts share a key: the lowest value.
 */
export enum NamePriority {
    CertificateSubject = 0,
    RequestSubject = 1,
    PrivateKey = 2,
    PublicKey = 3
}

export interface KeyExtraction {
    key: PublicKeyMaterial;
    priority: NamePriority;
    label: string;
}

/**
 * the public key an artifact is about, together with the label it proposes for that key.
 * CRLs carry no key of their own.
 */
export function extractKey(filename: Filename, artifact: Artifact): KeyExtraction | undefined {
    switch (artifact.kind) {
        case "rsaKey":
            return {
                key: artifact.publicKey,
                priority: artifact.isPrivate ? NamePriority.PrivateKey : NamePriority.PublicKey,
                label: filename
            };
        case "certificate":
            return { key: artifact.publicKey, priority: NamePriority.CertificateSubject, label: artifact.subject.toString() };
        case "request":
            return { key: artifact.publicKey, priority: NamePriority.RequestSubject, label: artifact.subject.toString() };
        case "crl":
            return undefined;
    }
}
