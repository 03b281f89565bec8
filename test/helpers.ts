import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { rimraf } from "rimraf";

import { type Artifact, type ArtifactKind, g_config } from "../lib";

g_config.silent = !process.env.VERBOSE;

export interface TestData {
    tmpFolder: string;
}

/**
 * give the suite a private temporary folder, removed once the suite is over.
 */
export function beforeTest(self: Mocha.Suite): TestData {
    self.timeout("1 minute");

    const testData: TestData = {
        tmpFolder: ""
    };

    before(() => {
        testData.tmpFolder = fs.mkdtempSync(path.join(os.tmpdir(), "pem-inventory-"));
    });
    after(async () => {
        await rimraf(testData.tmpFolder);
    });
    return testData;
}

export function writeTestFile(folder: string, relativeName: string, contents: string): string {
    const filename = path.join(folder, relativeName);
    fs.mkdirSync(path.dirname(filename), { recursive: true });
    fs.writeFileSync(filename, contents);
    return filename;
}

export function assertKind<K extends ArtifactKind>(
    artifact: Artifact | undefined,
    kind: K
): asserts artifact is Extract<Artifact, { kind: K }> {
    if (!artifact || artifact.kind !== kind) {
        throw new Error(`expecting a ${kind}, got ${artifact ? artifact.kind : "nothing"}`);
    }
}
