import path from "node:path";
import "should";

import {
    type Artifact,
    ArtifactCollection,
    Subject,
    buildInventory,
    buildRegistry,
    classify,
    compareEntries,
    describeCollection,
    formatReport
} from "../lib";
import { beforeTest, writeTestFile } from "./helpers";
import { certificatePem, certificateRequestPem, crlPem, privateKeyPem, publicKeyMaterial, rsaPublicKeyPem } from "./pki_factory";

class BrokenSubject extends Subject {
    public toString(): string {
        throw new Error("cannot render this name");
    }
}

function classified(pem: string): Artifact {
    const artifact = classify(pem);
    if (!artifact) {
        throw new Error("cannot classify test artifact");
    }
    return artifact;
}

describe("buildInventory", function (this: Mocha.Suite) {
    const testData = beforeTest(this);

    it("should report a CA certificate, a request and the private key of the request", () => {
        const folder = path.join(testData.tmpFolder, "simple");
        const root = writeTestFile(folder, "root.pem", certificatePem({ subject: "Root", key: "root" }));
        const request = writeTestFile(folder, "leaf.csr", certificateRequestPem("Leaf", "leaf"));
        const key = writeTestFile(folder, "leaf.key", privateKeyPem("leaf"));

        const entries = buildInventory([folder], { warn: () => undefined });

        entries.should.eql([
            {
                description: [
                    "Certificate for CN=Root",
                    "  with key<CN=Root>",
                    "  serial number 1",
                    "  issued by CN=Root",
                    "  signed by key<CN=Root>"
                ].join("\n"),
                path: root
            },
            {
                description: ["Certificate request for CN=Leaf", "  with key<CN=Leaf>", "  signed by key<CN=Leaf>"].join("\n"),
                path: request
            },
            { description: "Private key for key<CN=Leaf>", path: key }
        ]);

        formatReport(entries).should.eql(
            [
                root + ":",
                "  Certificate for CN=Root",
                "    with key<CN=Root>",
                "    serial number 1",
                "    issued by CN=Root",
                "    signed by key<CN=Root>",
                "",
                request + ":",
                "  Certificate request for CN=Leaf",
                "    with key<CN=Leaf>",
                "    signed by key<CN=Leaf>",
                "",
                key + ":",
                "  Private key for key<CN=Leaf>",
                "",
                ""
            ].join("\n")
        );
    });

    it("should give the same report whatever the order of the paths", () => {
        const folder = path.join(testData.tmpFolder, "ordering");
        const files = [
            writeTestFile(folder, "a/server.pub", rsaPublicKeyPem("server")),
            writeTestFile(folder, "b/server.pem", certificatePem({ subject: "Server", issuer: "Root", key: "server", signedWith: "root" })),
            writeTestFile(folder, "c/root.pem", certificatePem({ subject: "Root", key: "root" })),
            writeTestFile(folder, "d/root.crl", crlPem("Root", [3], "root"))
        ];
        const forward = buildInventory(files, { warn: () => undefined });
        const backward = buildInventory([...files].reverse(), { warn: () => undefined });
        forward.should.eql(backward);
        forward.map((e) => e.description.split("\n")[0]).should.eql([
            "Certificate for CN=Root",
            "Certificate for CN=Server",
            "Certificate revocation list",
            "Public key for key<CN=Server>"
        ]);
    });

    it("should sort entries with the same description by path", () => {
        const folder = path.join(testData.tmpFolder, "duplicates");
        const second = writeTestFile(folder, "z.key", privateKeyPem("leaf"));
        const first = writeTestFile(folder, "a.key", privateKeyPem("leaf"));
        const entries = buildInventory([second, first], { warn: () => undefined });
        entries.map((e) => e.path).should.eql([first, second]);
        // both private keys share a priority: the last one seen names the key
        entries[0].description.should.eql("Private key for key<" + first + ">");
    });

    it("should report nothing for a serial file", () => {
        const folder = path.join(testData.tmpFolder, "serial_only");
        writeTestFile(folder, "serial", "this is not PEM\n");
        const warnings: string[] = [];
        buildInventory([folder], { warn: (message) => warnings.push(message) }).should.eql([]);
        warnings.should.eql([]);
    });

    it("should drop an artifact that cannot be described and keep the others", () => {
        const root = classified(certificatePem({ subject: "Root", key: "root" }));
        const leaf = classified(certificatePem({ subject: "Leaf", issuer: "Root", key: "leaf", signedWith: "root" }));
        if (leaf.kind !== "certificate") {
            throw new Error("expecting a certificate");
        }
        const broken: Artifact = { ...leaf, subject: new BrokenSubject("CN=Leaf") };
        const collection = new ArtifactCollection(
            new Map([
                ["root.pem", root],
                ["broken.pem", broken]
            ])
        );

        const registry = buildRegistry(collection);
        registry.size.should.eql(1);
        registry.has(publicKeyMaterial("root")).should.eql(true);

        const entries = describeCollection(collection, registry);
        entries.map((e) => e.path).should.eql(["root.pem"]);
    });
});

describe("compareEntries", () => {
    it("should order by description, then by path", () => {
        const entries = [
            { description: "b", path: "1" },
            { description: "a", path: "2" },
            { description: "a", path: "1" }
        ];
        entries.sort(compareEntries).should.eql([
            { description: "a", path: "1" },
            { description: "a", path: "2" },
            { description: "b", path: "1" }
        ]);
    });
});
