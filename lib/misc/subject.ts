// ---------------------------------------------------------------------------------------------------------------------
// pem-inventory
// ---------------------------------------------------------------------------------------------------------------------
// Copyright (c) 2014-2022 - Etienne Rossignon - etienne.rossignon (at) gadz.org
// Copyright (c) 2022 - Sterfive.com
// ---------------------------------------------------------------------------------------------------------------------
//
// This  project is licensed under the terms of the MIT license.
//
// Permission is hereby granted, free of charge, to any person obtaining a copy of this software and associated
// documentation files (the "Software"), to deal in the Software without restriction, including without limitation the
// rights to use, copy, modify, merge, publish, distribute, sublicense, and/or sell copies of the Software, and to
// permit persons to whom the Software is furnished to do so,  subject to the following conditions:
//
// The above copyright notice and this permission notice shall be included in all copies or substantial portions of the
// Software.
//
// THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR IMPLIED, INCLUDING BUT NOT LIMITED TO THE
// WARRANTIES OF MERCHANTABILITY, FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE AUTHORS OR
// COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR
// OTHERWISE, ARISING FROM, OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN THE SOFTWARE.
// ---------------------------------------------------------------------------------------------------------------------

export interface SubjectOptions {
    commonName?: string;
    organization?: string;
    organizationalUnit?: string;
    locality?: string;
    state?: string;
    country?: string;
    domainComponent?: string;
    emailAddress?: string;
}

/**
 * an attribute of a distinguished name, as found in the certificate.
 * `type` is the attribute name (`commonName`), or its dotted OID when it has no name;
 * `shortName` is only known for the usual attributes.
 */
export interface NameAttribute {
    type: string;
    shortName?: string;
    value: string;
}

type SubjectField = keyof SubjectOptions;

const _keys: Record<string, SubjectField> = {
    C: "country",
    CN: "commonName",
    DC: "domainComponent",
    L: "locality",
    O: "organization",
    OU: "organizationalUnit",
    ST: "state",
    emailAddress: "emailAddress",
    E: "emailAddress",
};

// rendering order
const _fields: [string, SubjectField][] = [
    ["C", "country"],
    ["ST", "state"],
    ["L", "locality"],
    ["O", "organization"],
    ["OU", "organizationalUnit"],
    ["CN", "commonName"],
    ["DC", "domainComponent"],
    ["emailAddress", "emailAddress"],
];

const enquoteIfNecessary = (str: string) => {
    str = str.replace(/"/g, "”");
    return str.match(/\/|=/) ? `"${str}"` : str;
};
const unquote = (str: string) => str.replace(/"/gm, "");
const unquote2 = (str?: string | undefined) => {
    if (!str) return str;
    const m = str.match(/^"(.*)"$/);
    return m ? m[1] : str;
};

/**
 * a distinguished name, such as the subject or the issuer of a certificate.
 */
export class Subject implements SubjectOptions {
    public readonly commonName?: string;
    public readonly organization?: string;
    public readonly organizationalUnit?: string;
    public readonly locality?: string;
    public readonly state?: string;
    public readonly country?: string;
    public readonly domainComponent?: string;
    public readonly emailAddress?: string;
    /** attributes without a short name, kept in certificate order */
    public readonly others: ReadonlyArray<NameAttribute>;

    constructor(options: SubjectOptions | string, others: NameAttribute[] = []) {
        if (typeof options === "string") {
            options = Subject.parse(options);
        }
        this.commonName = unquote2(options.commonName);
        this.organization = unquote2(options.organization);
        this.organizationalUnit = unquote2(options.organizationalUnit);
        this.locality = unquote2(options.locality);
        this.state = unquote2(options.state);
        this.country = unquote2(options.country);
        this.domainComponent = unquote2(options.domainComponent);
        this.emailAddress = unquote2(options.emailAddress);
        this.others = others;
    }

    /**
     * build a Subject out of the attributes of a decoded name.
     * When an attribute is repeated (e.g. several OU) the values are joined with "+".
     */
    public static fromAttributes(attributes: NameAttribute[]): Subject {
        const options: SubjectOptions = {};
        const others: NameAttribute[] = [];
        for (const attribute of attributes) {
            const field = attribute.shortName ? _keys[attribute.shortName] : undefined;
            if (!field) {
                others.push(attribute);
                continue;
            }
            const existing = options[field];
            options[field] = existing === undefined ? attribute.value : existing + "+" + attribute.value;
        }
        return new Subject(options, others);
    }

    public static parse(str: string): SubjectOptions {
        const elements = str.split(/\/(?=[^/]*?=)/);
        const options: SubjectOptions = {};

        elements.forEach((element: string) => {
            if (element.length === 0) {
                return;
            }
            const s: string[] = element.split("=");

            if (s.length !== 2) {
                throw new Error("invalid format for " + element);
            }
            const longName = _keys[s[0]];
            if (!longName) {
                throw new Error("Invalid field found in subject name " + s[0]);
            }
            options[longName] = unquote(Buffer.from(s[1], "ascii").toString("utf8"));
        });
        return options;
    }

    public toString(): string {
        const tmp: string[] = [];
        for (const [shortName, field] of _fields) {
            const value = this[field];
            if (value !== undefined) {
                tmp.push(shortName + "=" + enquoteIfNecessary(value));
            }
        }
        for (const other of this.others) {
            tmp.push(other.type + "=" + enquoteIfNecessary(other.value));
        }
        return tmp.join("/");
    }
}
