import { debugLog } from "../toolbox/debug";
import type { Artifact } from "./artifact";
import {
    decodeCertificate,
    decodeCertificateRequest,
    decodeCertificateRevocationList,
    decodeRsaPrivateKey,
    decodeRsaPublicKey
} from "./decoder";

interface Marker {
    marker: string;
    decode: (contents: string) => Artifact;
}

// "CERTIFICATE REQUEST" must be tested before "CERTIFICATE"
const markers: Marker[] = [
    { marker: "BEGIN X509 CRL", decode: decodeCertificateRevocationList },
    { marker: "BEGIN CERTIFICATE REQUEST", decode: decodeCertificateRequest },
    { marker: "BEGIN CERTIFICATE", decode: decodeCertificate },
    { marker: "BEGIN RSA PRIVATE KEY", decode: decodeRsaPrivateKey },
    { marker: "BEGIN RSA PUBLIC KEY", decode: decodeRsaPublicKey }
];

export function firstLine(contents: string): string {
    const end = contents.indexOf("\n");
    const line = end < 0 ? contents : contents.substring(0, end);
    return line.endsWith("\r") ? line.substring(0, line.length - 1) : line;
}

/**
 * find out what kind of PEM artifact the given text holds, by looking at its first line only.
 * Returns undefined when the header is not recognized or when the content cannot be decoded.
 */
export function classify(contents: string): Artifact | undefined {
    const header = firstLine(contents);
    const match = markers.find((m) => header.includes(m.marker));
    if (!match) {
        return undefined;
    }
    try {
        return match.decode(contents);
    } catch (err) {
        debugLog("cannot decode", match.marker, "content:", err);
        return undefined;
    }
}
