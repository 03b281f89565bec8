import type { pki } from "node-forge";

import type { Subject } from "../misc/subject";

/**
 * an RSA public key, identified by its SubjectPublicKeyInfo PEM.
 * Two materials are the same key when their `pem` strings are equal.
 */
export interface PublicKeyMaterial {
    readonly pem: string;
    readonly key: pki.rsa.PublicKey;
}

/**
 * the part of a signed structure needed to check its signature:
 * the digest of the to-be-signed bytes and the raw signature, both as binary strings.
 */
export interface SignedData {
    readonly digest: string;
    readonly signature: string;
}

export interface CertificateArtifact {
    readonly kind: "certificate";
    readonly subject: Subject;
    readonly issuer: Subject;
    readonly serial: bigint;
    readonly publicKey: PublicKeyMaterial;
    /** undefined when the signature algorithm cannot be checked */
    readonly signed: SignedData | undefined;
}

export interface RequestArtifact {
    readonly kind: "request";
    readonly subject: Subject;
    readonly publicKey: PublicKeyMaterial;
    readonly signed: SignedData | undefined;
}

export interface CrlArtifact {
    readonly kind: "crl";
    readonly issuer: Subject;
    readonly revokedSerials: ReadonlyArray<bigint>;
    readonly signed: SignedData | undefined;
}

export interface RsaKeyArtifact {
    readonly kind: "rsaKey";
    readonly isPrivate: boolean;
    /** for a private key, the public half derived from it */
    readonly publicKey: PublicKeyMaterial;
}

export type Artifact = CertificateArtifact | RequestArtifact | CrlArtifact | RsaKeyArtifact;

export type SignedArtifact = CertificateArtifact | RequestArtifact | CrlArtifact;

export type ArtifactKind = Artifact["kind"];

export function isSigned(artifact: Artifact): artifact is SignedArtifact {
    return artifact.kind !== "rsaKey";
}
