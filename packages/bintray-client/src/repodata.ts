import { rpmFilename } from "@bintray-kit/rpm-spec";
import { XMLParser } from "fast-xml-parser";
import { z } from "zod";

import { BintrayError } from "./errors.js";

export interface RepomdEntry {
  type: string;
  href: string;
}

export interface PrimaryPackage {
  name: string;
  arch: string;
  epoch: string;
  ver: string;
  rel: string;
  checksumType: string;
  checksum: string;
}

const ARRAY_PATHS = new Set(["repomd.data", "metadata.package"]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  textNodeName: "#text",
  ignoreDeclaration: true,
  parseTagValue: false,
  parseAttributeValue: false,
  removeNSPrefix: true,
  isArray: (_name: string, jPath: string) => ARRAY_PATHS.has(jPath),
});

const repomdSchema = z.object({
  repomd: z.object({
    data: z
      .array(
        z.object({
          type: z.string(),
          location: z.object({ href: z.string() }),
        })
      )
      .default([]),
  }),
});

const primarySchema = z.object({
  metadata: z.object({
    package: z
      .array(
        z.object({
          name: z.string(),
          arch: z.string(),
          version: z.object({
            epoch: z.string().default("0"),
            ver: z.string(),
            rel: z.string(),
          }),
          checksum: z.object({
            type: z.string(),
            "#text": z.string(),
          }),
        })
      )
      .default([]),
  }),
});

function parseXml(xml: string, document: string): unknown {
  try {
    return parser.parse(xml);
  } catch (error) {
    throw new BintrayError("invalid-response", `${document}: malformed XML`, { cause: error });
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}

export function parseRepomd(xml: string): RepomdEntry[] {
  const parsed = repomdSchema.safeParse(parseXml(xml, "repomd.xml"));
  if (!parsed.success) {
    throw new BintrayError("invalid-response", `repomd.xml: ${describeIssues(parsed.error)}`);
  }
  return parsed.data.repomd.data.map(entry => ({ type: entry.type, href: entry.location.href }));
}

export function parsePrimary(xml: string): PrimaryPackage[] {
  const parsed = primarySchema.safeParse(parseXml(xml, "primary.xml"));
  if (!parsed.success) {
    throw new BintrayError("invalid-response", `primary.xml: ${describeIssues(parsed.error)}`);
  }
  return parsed.data.metadata.package.map(pkg => ({
    name: pkg.name,
    arch: pkg.arch,
    epoch: pkg.version.epoch,
    ver: pkg.version.ver,
    rel: pkg.version.rel,
    checksumType: pkg.checksum.type,
    checksum: pkg.checksum["#text"].trim(),
  }));
}

export function rpmPackageFilename(pkg: PrimaryPackage): string {
  return rpmFilename({
    name: pkg.name,
    epoch: pkg.epoch,
    version: pkg.ver,
    release: pkg.rel,
    arch: pkg.arch,
  });
}
