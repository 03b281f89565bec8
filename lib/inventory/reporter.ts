import type { Artifact, CertificateArtifact, CrlArtifact, PublicKeyMaterial, RequestArtifact } from "./artifact";
import type { KeyRegistry } from "./key_registry";
import { signedBy, unknownSigner } from "./signature_resolver";

const indent = "  ";

function keyName(key: PublicKeyMaterial, registry: KeyRegistry): string {
    return registry.nameOf(key) ?? unknownSigner;
}

function describeCertificate(certificate: CertificateArtifact, registry: KeyRegistry): string[] {
    return [
        "Certificate for " + certificate.subject.toString(),
        indent + "with " + keyName(certificate.publicKey, registry),
        indent + "serial number " + certificate.serial.toString(),
        indent + "issued by " + certificate.issuer.toString(),
        indent + "signed by " + signedBy(certificate, registry)
    ];
}

function describeRequest(request: RequestArtifact, registry: KeyRegistry): string[] {
    return [
        "Certificate request for " + request.subject.toString(),
        indent + "with " + keyName(request.publicKey, registry),
        indent + "signed by " + signedBy(request, registry)
    ];
}

export function describeRevokedSerials(serials: ReadonlyArray<bigint>): string {
    if (serials.length === 0) {
        return "revoking nothing";
    }
    return "revoking serial numbers [" + serials.map((s) => s.toString()).join(", ") + "]";
}

function describeCrl(crl: CrlArtifact, registry: KeyRegistry): string[] {
    return [
        "Certificate revocation list",
        indent + describeRevokedSerials(crl.revokedSerials),
        indent + "issued by " + crl.issuer.toString(),
        indent + "signed by " + signedBy(crl, registry)
    ];
}

/**
 * a human readable description of an artifact, naming keys as the registry does.
 * Continuation lines are indented by two spaces.
 */
export function describeArtifact(artifact: Artifact, registry: KeyRegistry): string {
    switch (artifact.kind) {
        case "rsaKey":
            return (artifact.isPrivate ? "Private key for " : "Public key for ") + keyName(artifact.publicKey, registry);
        case "certificate":
            return describeCertificate(artifact, registry).join("\n");
        case "request":
            return describeRequest(artifact, registry).join("\n");
        case "crl":
            return describeCrl(artifact, registry).join("\n");
        default:
            return unknownArtifact(artifact);
    }
}

// only reachable if a new kind of artifact is added without being described
function unknownArtifact(_artifact: never): string {
    return "Unknown";
}
