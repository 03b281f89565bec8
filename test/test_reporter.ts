import "should";

import { type Artifact, KeyRegistry, NamePriority, classify, describeArtifact, describeRevokedSerials } from "../lib";
import {
    certificatePem,
    certificateRequestPem,
    crlPem,
    privateKeyPem,
    pssCertificatePem,
    publicKeyMaterial,
    rsaPublicKeyPem
} from "./pki_factory";

function classified(pem: string): Artifact {
    const artifact = classify(pem);
    if (!artifact) {
        throw new Error("cannot classify test artifact");
    }
    return artifact;
}

describe("describeArtifact", function (this: Mocha.Suite) {
    this.timeout("1 minute");

    let registry: KeyRegistry;
    before(() => {
        registry = KeyRegistry.build([
            { key: publicKeyMaterial("root"), priority: NamePriority.CertificateSubject, label: "CN=Root" },
            { key: publicKeyMaterial("leaf"), priority: NamePriority.PrivateKey, label: "leaf.key" }
        ]);
    });

    it("should describe a private key", () => {
        describeArtifact(classified(privateKeyPem("leaf")), registry).should.eql("Private key for key<leaf.key>");
    });

    it("should describe a public key", () => {
        describeArtifact(classified(rsaPublicKeyPem("root")), registry).should.eql("Public key for key<CN=Root>");
    });

    it("should describe a certificate", () => {
        const certificate = classified(certificatePem({ subject: "Leaf", issuer: "Root", serialNumber: "0a", key: "leaf", signedWith: "root" }));
        describeArtifact(certificate, registry).should.eql(
            [
                "Certificate for CN=Leaf",
                "  with key<leaf.key>",
                "  serial number 10",
                "  issued by CN=Root",
                "  signed by key<CN=Root>"
            ].join("\n")
        );
    });

    it("should describe a certificate request", () => {
        describeArtifact(classified(certificateRequestPem("Leaf", "leaf")), registry).should.eql(
            ["Certificate request for CN=Leaf", "  with key<leaf.key>", "  signed by key<leaf.key>"].join("\n")
        );
    });

    it("should describe a CRL", () => {
        describeArtifact(classified(crlPem("Root", [7, 42], "root")), registry).should.eql(
            [
                "Certificate revocation list",
                "  revoking serial numbers [7, 42]",
                "  issued by CN=Root",
                "  signed by key<CN=Root>"
            ].join("\n")
        );
    });

    it("should describe an empty CRL signed by an unknown key", () => {
        describeArtifact(classified(crlPem("Elsewhere", [], "other")), registry).should.eql(
            ["Certificate revocation list", "  revoking nothing", "  issued by CN=Elsewhere", "  signed by ???"].join("\n")
        );
    });

    it("should report an unknown signer when the signature algorithm cannot be checked", () => {
        const withPssKey = KeyRegistry.build([
            { key: publicKeyMaterial("pss"), priority: NamePriority.CertificateSubject, label: "CN=PssRoot" }
        ]);
        describeArtifact(classified(pssCertificatePem("PssRoot", "pss")), withPssKey).should.eql(
            [
                "Certificate for CN=PssRoot",
                "  with key<CN=PssRoot>",
                "  serial number 1",
                "  issued by CN=PssRoot",
                "  signed by ???"
            ].join("\n")
        );
    });

    it("should show ??? for a key that is not registered", () => {
        describeArtifact(classified(privateKeyPem("other")), registry).should.eql("Private key for ???");
    });
});

describe("describeRevokedSerials", () => {
    it("should say nothing is revoked", () => {
        describeRevokedSerials([]).should.eql("revoking nothing");
    });
    it("should list the revoked serial numbers", () => {
        describeRevokedSerials([BigInt(7), BigInt(42)]).should.eql("revoking serial numbers [7, 42]");
    });
});
