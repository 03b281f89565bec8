// ---------------------------------------------------------------------------------------------------------------------
// pem-inventory
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2022 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022-2026 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
// This project is licensed under the terms of the MIT license.
// ---------------------------------------------------------------------------------------------------------------------

import forge from "node-forge";
import { exploreCertificate, exploreCertificateRevocationList } from "node-opcua-crypto";

import { type NameAttribute, Subject } from "../misc/subject";
import { debugLog } from "../toolbox/debug";
import type {
    CertificateArtifact,
    CrlArtifact,
    PublicKeyMaterial,
    RequestArtifact,
    RsaKeyArtifact,
    SignedData
} from "./artifact";

// universal tags and classes (X.690)
const TAG_BIT_STRING = 0x03;
const TAG_OID = 0x06;
const TAG_SEQUENCE = 0x10;
const CLASS_UNIVERSAL = 0x00;

type Asn1 = forge.asn1.Asn1;

/** short names of the attributes we render, by attribute name */
const shortNames: Record<string, string> = {
    commonName: "CN",
    countryName: "C",
    localityName: "L",
    stateOrProvinceName: "ST",
    organizationName: "O",
    organizationalUnitName: "OU",
    organizationUnitName: "OU",
    domainComponent: "DC",
    emailAddress: "emailAddress"
};

/** RSASSA-PKCS1-v1_5 signature algorithms, by OID */
const digestFactories: Record<string, () => forge.md.MessageDigest> = {
    "1.2.840.113549.1.1.4": () => forge.md.md5.create(),
    "1.2.840.113549.1.1.5": () => forge.md.sha1.create(),
    "1.2.840.113549.1.1.11": () => forge.md.sha256.create(),
    "1.2.840.113549.1.1.12": () => forge.md.sha384.create(),
    "1.2.840.113549.1.1.13": () => forge.md.sha512.create()
};

function isUniversal(node: Asn1 | undefined, tag: number): node is Asn1 {
    return node !== undefined && node.tagClass === CLASS_UNIVERSAL && node.type === tag;
}

function childrenOf(node: Asn1, what: string): Asn1[] {
    if (!Array.isArray(node.value)) {
        throw new Error(`invalid ${what}: expecting a constructed value`);
    }
    return node.value;
}

function readOid(node: Asn1 | undefined): string {
    if (!isUniversal(node, TAG_OID) || typeof node.value !== "string") {
        throw new Error("invalid object identifier");
    }
    return forge.asn1.derToOid(forge.util.createBuffer(node.value));
}

/**
 * a serial number written in hexadecimal, with or without ":" between the bytes, as a non-negative integer
 */
export function hexToBigInt(hex: string): bigint {
    const digits = hex.replace(/[^0-9a-fA-F]/g, "");
    return digits.length === 0 ? BigInt(0) : BigInt("0x" + digits);
}

/**
 * the content of a BIT STRING, without the leading "unused bits" byte.
 */
function readBitString(node: Asn1): string {
    if (!isUniversal(node, TAG_BIT_STRING)) {
        throw new Error("invalid signature: expecting a bit string");
    }
    // forge keeps the original bytes aside when it decodes the content as nested ASN.1
    if ("bitStringContents" in node && typeof node.bitStringContents === "string") {
        return node.bitStringContents.substring(1);
    }
    if (typeof node.value !== "string") {
        throw new Error("invalid signature: cannot read the bit string content");
    }
    return node.value.substring(1);
}

/**
 * build a Subject out of (attribute name, value) pairs.
 * Every name of the inventory goes through here, whatever decoded it.
 */
export function subjectFromNamedValues(values: Iterable<[string, unknown]>): Subject {
    const attributes: NameAttribute[] = [];
    for (const [type, value] of values) {
        if (typeof value !== "string") {
            continue;
        }
        attributes.push({ type, shortName: shortNames[type], value });
    }
    return Subject.fromAttributes(attributes);
}

/**
 * a name explored by node-opcua-crypto: one property per attribute.
 */
export function subjectFromDirectoryName(name: object): Subject {
    return subjectFromNamedValues(Object.entries(name));
}

function subjectFromForge(name: forge.pki.Certificate["subject"]): Subject {
    return subjectFromNamedValues(name.attributes.map((attribute): [string, unknown] => [attribute.name ?? attribute.type ?? "", attribute.value]));
}

export function toPublicKeyMaterial(key: forge.pki.PublicKey): PublicKeyMaterial {
    const pem = forge.pki.publicKeyToPem(key);
    return { pem, key: forge.pki.publicKeyFromPem(pem) };
}

/**
 * split a DER encoded SIGNED{...} structure (certificate, request or CRL)
 * into its to-be-signed part and the signature that covers it.
 * `signed` is undefined when the signature algorithm is not one we can check.
 */
export function readSignedStructure(der: string): { tbs: Asn1; signed: SignedData | undefined } {
    const root = forge.asn1.fromDer(der);
    const [tbs, algorithm, signature] = childrenOf(root, "signed structure");
    if (!isUniversal(tbs, TAG_SEQUENCE) || !isUniversal(algorithm, TAG_SEQUENCE) || !signature) {
        throw new Error("invalid signed structure");
    }
    const [algorithmOid] = childrenOf(algorithm, "signature algorithm");
    const oid = readOid(algorithmOid);
    const signatureValue = readBitString(signature);
    const createDigest = digestFactories[oid];
    if (!createDigest) {
        debugLog("unsupported signature algorithm", oid, ": the signer cannot be identified");
        return { tbs, signed: undefined };
    }
    const md = createDigest();
    md.update(forge.asn1.toDer(tbs).getBytes());
    return {
        tbs,
        signed: {
            digest: md.digest().getBytes(),
            signature: signatureValue
        }
    };
}

function pemBody(pem: string, expectedType: string): string {
    const message = forge.pem.decode(pem).find((m) => m.type === expectedType);
    if (!message) {
        throw new Error("cannot find a " + expectedType + " PEM block");
    }
    return message.body;
}

function toDER(binary: string): Buffer {
    return Buffer.from(binary, "binary");
}

export function decodeCertificate(pem: string): CertificateArtifact {
    const der = pemBody(pem, "CERTIFICATE");
    const { signed } = readSignedStructure(der);
    const { tbsCertificate } = exploreCertificate(toDER(der));
    // forge only for the key: node-opcua-crypto does not hand out a verifier for a bare public key
    const certificate = forge.pki.certificateFromPem(pem);
    return {
        kind: "certificate",
        subject: subjectFromDirectoryName(tbsCertificate.subject),
        issuer: subjectFromDirectoryName(tbsCertificate.issuer),
        serial: hexToBigInt(tbsCertificate.serialNumber),
        publicKey: toPublicKeyMaterial(certificate.publicKey),
        signed
    };
}

export function decodeCertificateRequest(pem: string): RequestArtifact {
    const request = forge.pki.certificationRequestFromPem(pem);
    if (!request.publicKey) {
        throw new Error("certificate request without public key");
    }
    const { signed } = readSignedStructure(pemBody(pem, "CERTIFICATE REQUEST"));
    return {
        kind: "request",
        subject: subjectFromForge(request.subject),
        publicKey: toPublicKeyMaterial(request.publicKey),
        signed
    };
}

export function decodeCertificateRevocationList(pem: string): CrlArtifact {
    const der = pemBody(pem, "X509 CRL");
    const { signed } = readSignedStructure(der);
    const { tbsCertList } = exploreCertificateRevocationList(toDER(der));
    const revokedSerials = tbsCertList.revokedCertificates.map((revoked) => hexToBigInt(revoked.userCertificate));
    return { kind: "crl", issuer: subjectFromDirectoryName(tbsCertList.issuer), revokedSerials, signed };
}

export function decodeRsaPrivateKey(pem: string): RsaKeyArtifact {
    const privateKey = forge.pki.privateKeyFromPem(pem);
    const publicKey = forge.pki.rsa.setPublicKey(privateKey.n, privateKey.e);
    return { kind: "rsaKey", isPrivate: true, publicKey: toPublicKeyMaterial(publicKey) };
}

export function decodeRsaPublicKey(pem: string): RsaKeyArtifact {
    return { kind: "rsaKey", isPrivate: false, publicKey: toPublicKeyMaterial(forge.pki.publicKeyFromPem(pem)) };
}

/**
 * check a signature against a candidate key.
 * forge throws when the signature cannot even be decrypted with the key: that is a mismatch too.
 */
export function verifySignature(signed: SignedData, publicKey: PublicKeyMaterial): boolean {
    try {
        return publicKey.key.verify(signed.digest, signed.signature);
    } catch (err) {
        debugLog("signature check failed:", err);
        return false;
    }
}
