/**
 * Tests for file reading with gzip support
 */

import { gzipSync } from "fflate";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FileError, ValidationError } from "../../src/errors";
import type { FileReaderOptions } from "../../src/types";
import { createStream, exists, readRawHead } from "../../src/io/file-reader";

const FASTA_TEXT = ">seq\nACGT\n";

let fixturesDir = "";
const fixture = (name: string): string => join(fixturesDir, name);

async function readBytes(stream: ReadableStream<Uint8Array>): Promise<Uint8Array> {
  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    chunks.push(value);
  }
  const result = new Uint8Array(chunks.reduce((total, chunk) => total + chunk.length, 0));
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

async function readText(stream: ReadableStream<Uint8Array>): Promise<string> {
  return new TextDecoder().decode(await readBytes(stream));
}

beforeAll(() => {
  fixturesDir = mkdtempSync(join(tmpdir(), "fasta-codestream-reader-"));
  writeFileSync(fixture("plain.fasta"), FASTA_TEXT);
  writeFileSync(fixture("packed.fasta.gz"), gzipSync(new TextEncoder().encode(FASTA_TEXT)));
  writeFileSync(fixture("packed.bin"), gzipSync(new TextEncoder().encode(FASTA_TEXT)));
  writeFileSync(fixture("large.fasta"), `>large\n${"ACGT".repeat(2000)}\n`);
  mkdirSync(fixture("a-directory"));
});

afterAll(() => {
  rmSync(fixturesDir, { recursive: true, force: true });
});

describe("exists", () => {
  test("is true for regular files", async () => {
    expect(await exists(fixture("plain.fasta"))).toBe(true);
  });

  test("is false for missing paths and directories", async () => {
    expect(await exists(fixture("missing.fasta"))).toBe(false);
    expect(await exists(fixture("a-directory"))).toBe(false);
  });

  test("rejects an empty path", async () => {
    await expect(exists("")).rejects.toBeInstanceOf(FileError);
  });
});

describe("createStream", () => {
  test("streams plain files", async () => {
    expect(await readText(await createStream(fixture("plain.fasta")))).toBe(FASTA_TEXT);
  });

  test("streams files larger than one buffer", async () => {
    const stream = await createStream(fixture("large.fasta"), { bufferSize: 1024 });

    expect(await readText(stream)).toBe(`>large\n${"ACGT".repeat(2000)}\n`);
  });

  test("decompresses .gz files automatically", async () => {
    expect(await readText(await createStream(fixture("packed.fasta.gz")))).toBe(FASTA_TEXT);
  });

  test("returns raw bytes when autoDecompress is off", async () => {
    const bytes = await readBytes(
      await createStream(fixture("packed.fasta.gz"), { autoDecompress: false })
    );

    expect(bytes[0]).toBe(0x1f);
    expect(bytes[1]).toBe(0x8b);
  });

  test("decompresses when gzip is requested explicitly", async () => {
    const stream = await createStream(fixture("packed.bin"), { compressionFormat: "gzip" });

    expect(await readText(stream)).toBe(FASTA_TEXT);
  });

  test("rejects missing files with FileError", async () => {
    await expect(createStream(fixture("missing.fasta"))).rejects.toThrow(
      `File does not exist or is not a regular file: ${fixture("missing.fasta")}`
    );
  });

  test("rejects invalid options", async () => {
    const options: FileReaderOptions = { bufferSize: 10 };

    await expect(createStream(fixture("plain.fasta"), options)).rejects.toBeInstanceOf(
      ValidationError
    );
  });
});

describe("readRawHead", () => {
  test("returns the first characters including line breaks", async () => {
    expect(await readRawHead(fixture("plain.fasta"), 5)).toBe(">seq\n");
  });

  test("returns the whole file when it is shorter than the limit", async () => {
    expect(await readRawHead(fixture("plain.fasta"))).toBe(FASTA_TEXT);
  });

  test("reads through gzip compression", async () => {
    expect(await readRawHead(fixture("packed.fasta.gz"), 7)).toBe(">seq\nAC");
  });

  test("stops reading once the limit is reached", async () => {
    expect(await readRawHead(fixture("large.fasta"), 10)).toBe(">large\nACG");
  });

  test("returns an empty string for a zero limit", async () => {
    expect(await readRawHead(fixture("plain.fasta"), 0)).toBe("");
  });

  test("rejects negative and fractional limits", async () => {
    await expect(readRawHead(fixture("plain.fasta"), -1)).rejects.toBeInstanceOf(ValidationError);
    await expect(readRawHead(fixture("plain.fasta"), 1.5)).rejects.toBeInstanceOf(ValidationError);
  });
});
