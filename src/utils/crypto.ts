import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import type { ChecksumAlgorithm } from "../types";

export const CHECKSUM_ALGORITHMS: readonly ChecksumAlgorithm[] = ["sha256", "md5"];

export function isChecksumAlgorithm(value: unknown): value is ChecksumAlgorithm {
  return CHECKSUM_ALGORITHMS.some((algorithm) => algorithm === value);
}

export async function computeFileChecksum(
  filePath: string,
  algorithm: ChecksumAlgorithm = "sha256",
): Promise<string> {
  const hash = createHash(algorithm);
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}
