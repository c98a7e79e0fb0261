/**
 * Tests for the FastaData facade and the loader entry points
 */

import { gzipSync } from "fflate";
import { describe, expect, test } from "vitest";
import { StreamError } from "../../src/errors";
import { createCode } from "../../src/formats/fasta/code";
import { FastaData } from "../../src/formats/fasta/data";
import { load } from "../../src/formats/fasta/loader";
import type { Code, CodeRecord } from "../../src/formats/fasta/types";

const quiet = load({ parser: { onWarning: () => {} } });

async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}

function byteStream(bytes: Uint8Array): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller): void {
      controller.enqueue(bytes);
      controller.close();
    },
  });
}

describe("FastaData", () => {
  test("raw characters survive a round trip", async () => {
    const characters = await collect(quiet.fromRawSequence(["A", "C", "G", "T"]).asCharacters());

    expect(characters).toEqual(["A", "C", "G", "T"]);
  });

  test("asString concatenates codes without metadata or line breaks", async () => {
    expect(await quiet.fromString(">seq\nAC\n;note\nGT\n").asString()).toBe("ACGT");
  });

  test("asCodes drops metadata but keeps positions", async () => {
    const codes = await collect(quiet.fromString(">seq\nAC\nG").asCodes());

    expect(codes).toEqual<Code[]>([
      { value: "A", position: 0 },
      { value: "C", position: 1 },
      { value: "G", position: 2 },
    ]);
  });

  test("records yields the parsed records", async () => {
    const records = await collect(quiet.fromString(">s\nA").records());

    expect(records).toEqual<CodeRecord[]>([
      {
        code: { value: "A", position: 0 },
        metadata: {
          descriptions: ["s"],
          comments: [],
          descriptionChanged: true,
          commentChanged: true,
        },
      },
    ]);
  });

  test("can only be consumed once", async () => {
    const data = quiet.fromString("ACGT");
    expect(data.isConsumed).toBe(false);

    data.records();

    expect(data.isConsumed).toBe(true);
    expect(() => data.records()).toThrow(StreamError);
    expect(() => data.write()).toThrow(StreamError);
    await expect(data.asString()).rejects.toBeInstanceOf(StreamError);
  });

  test("claims the data as soon as a view is requested", () => {
    const characters = quiet.fromString("ACGT");
    characters.asCharacters();
    expect(() => characters.asCharacters()).toThrow(StreamError);

    const codes = quiet.fromString("ACGT");
    codes.asCodes();
    expect(codes.isConsumed).toBe(true);
    expect(() => codes.records()).toThrow(StreamError);
  });

  test("write().toText() produces FASTA text", async () => {
    expect(await quiet.fromString(">seq\nACGT").write().toText()).toBe("\n\n>seq\nACGT");
  });

  test("applies the loader's writer options", async () => {
    const narrow = load({ writer: { lineWidth: 2 } });

    expect(await narrow.fromRawSequence("ACGTA").write().toText()).toBe("AC\nGT\nA");
  });

  test("write().toStream() writes bytes to a web stream", async () => {
    const chunks: string[] = [];
    const decoder = new TextDecoder();
    const stream = new WritableStream<Uint8Array>({
      write(chunk): void {
        chunks.push(decoder.decode(chunk));
      },
    });

    const written = await quiet.fromRawSequence("ACGT").write().toStream(stream);

    expect(chunks.join("")).toBe("ACGT");
    expect(written).toBe(4);
  });

  test("wraps a synchronous record array", async () => {
    const data = new FastaData([
      {
        code: { value: "T", position: 0 },
        metadata: {
          descriptions: [],
          comments: ["c"],
          descriptionChanged: false,
          commentChanged: true,
        },
      },
    ]);

    expect(await data.write().toText()).toBe("\n;c\nT");
  });
});

describe("load", () => {
  test("fromLines parses async line sources", async () => {
    async function* lines(): AsyncGenerator<string> {
      yield ">async";
      yield "TTAG";
    }

    expect(await quiet.fromLines(lines()).asString()).toBe("TTAG");
  });

  test("fromStream parses plain byte streams", async () => {
    const data = quiet.fromStream(byteStream(new TextEncoder().encode(">p\nAC\nGT\n")));

    expect(await data.asString()).toBe("ACGT");
  });

  test("fromStream decompresses gzip streams on request", async () => {
    const compressed = gzipSync(new TextEncoder().encode(">g\nAC\nGT\n"));
    const data = quiet.fromStream(byteStream(compressed), { compressionFormat: "gzip" });

    expect(await data.asString()).toBe("ACGT");
  });

  test("fromStream decompresses gzip whose first chunk is tiny or empty", async () => {
    const compressed = gzipSync(new TextEncoder().encode(">g\nAC\nGT\n"));
    const split = new ReadableStream<Uint8Array>({
      start(controller): void {
        controller.enqueue(new Uint8Array(0));
        controller.enqueue(compressed.slice(0, 1));
        controller.enqueue(compressed.slice(1));
        controller.close();
      },
    });

    expect(await quiet.fromStream(split, { compressionFormat: "gzip" }).asString()).toBe("ACGT");
  });

  test("fromStream honours an encoding override", async () => {
    const bytes = new Uint8Array([0x3e, 0xe9, 0x0a, 0x41]);
    const [record] = await collect(
      quiet.fromStream(byteStream(bytes), { encoding: "latin1" }).records()
    );

    expect(record?.metadata.descriptions).toEqual(["é"]);
  });

  test("fromSequence passes records through", async () => {
    const record: CodeRecord = {
      code: { value: "G", position: 4 },
      metadata: {
        descriptions: ["x"],
        comments: [],
        descriptionChanged: true,
        commentChanged: false,
      },
    };

    expect(await quiet.fromSequence([record]).write().toText()).toBe("\n\n>x\nG");
  });

  test("fromCodeSequence keeps code positions", async () => {
    const codes = await collect(
      quiet.fromCodeSequence([createCode("A", 5), createCode("C", 9)]).asCodes()
    );

    expect(codes.map((code) => code.position)).toEqual([5, 9]);
  });
});
