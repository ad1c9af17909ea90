import { sha1 } from "@noble/hashes/sha1";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import fs from "fs-extra";

export interface ContentChecksum {
  sha1?: Uint8Array;
  sha256?: Uint8Array;
}

interface HeaderSource {
  get(name: string): string | null;
}

export const CHECKSUM_HEADER = "X-Checksum-Sha2";

export function checksumBytes(data: Uint8Array): Required<ContentChecksum> {
  return { sha1: sha1(data), sha256: sha256(data) };
}

export async function checksumFile(path: string): Promise<Required<ContentChecksum>> {
  const first = sha1.create();
  const second = sha256.create();
  const stream = fs.createReadStream(path);
  for await (const chunk of stream) {
    const bytes = typeof chunk === "string" ? new TextEncoder().encode(chunk) : new Uint8Array(chunk);
    first.update(bytes);
    second.update(bytes);
  }
  return { sha1: first.digest(), sha256: second.digest() };
}

export function checksumToHex(checksum: Uint8Array): string {
  return bytesToHex(checksum);
}

/** Decodes a hex digest; malformed input yields `undefined`. */
export function checksumFromHex(hex: string): Uint8Array | undefined {
  const trimmed = hex.trim();
  if (!trimmed || trimmed.length % 2 !== 0 || !/^[0-9a-fA-F]+$/.test(trimmed)) return undefined;
  return hexToBytes(trimmed.toLowerCase());
}

export function checksumFromResponse(headers: HeaderSource): Uint8Array | undefined {
  const value = headers.get(CHECKSUM_HEADER);
  return value === null ? undefined : checksumFromHex(value);
}

export function sameChecksum(left: Uint8Array | undefined, right: Uint8Array | undefined): boolean {
  if (left === undefined || right === undefined) return left === right;
  return checksumToHex(left) === checksumToHex(right);
}
