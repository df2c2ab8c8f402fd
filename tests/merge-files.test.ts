/**
 * Tests for file-level merging
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { createDefaultRegistry } from "../src/grammar/index.js";
import { mergeFile, mergeFiles, readRevisions, type StructuredMergeOptions } from "../src/merge/index.js";
import { cleanupTempDir, createTempDir, writeRevisions } from "./helpers/temp.js";

const options: StructuredMergeOptions = { registry: createDefaultRegistry() };

describe("file merging", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe("readRevisions", () => {
    it("should read all three files", async () => {
      const paths = await writeRevisions(tempDir, { base: "b\n", left: "l\n", right: "r\n" });

      expect(await readRevisions(paths)).toEqual({ success: true, texts: { base: "b\n", left: "l\n", right: "r\n" } });
    });

    it("should report the first missing file", async () => {
      const paths = await writeRevisions(tempDir, { base: "b\n", left: "l\n", right: "r\n" });
      const missing = path.join(tempDir, "gone.yaml");

      expect(await readRevisions({ ...paths, left: missing, right: missing })).toEqual({
        success: false,
        error: `File not found: ${missing}`,
        failedFile: "left",
        missing: true,
      });
    });
  });

  describe("mergeFile", () => {
    it("should merge JSON files", async () => {
      const paths = await writeRevisions(
        tempDir,
        {
          base: '{\n  "a": 1,\n  "b": 2\n}\n',
          left: '{\n  "a": 10,\n  "b": 2\n}\n',
          right: '{\n  "a": 1,\n  "b": 20\n}\n',
        },
        "json",
      );
      const result = await mergeFile({ paths }, options);

      expect(result.status).toBe("merged");
      if (result.status !== "merged") return;
      expect(result.grammar).toBe("json");
      expect(result.outcome).toMatchObject({ status: "clean", text: '{\n  "a": 10,\n  "b": 20\n}\n' });
    });

    it("should detect the grammar from the final path name", async () => {
      const paths = await writeRevisions(tempDir, { base: "a: 1\n", left: "a: 1\n", right: "a: 2\n" }, "tmp");

      const detected = await mergeFile({ paths, pathName: "config/app.yml" }, options);
      const undetected = await mergeFile({ paths }, options);

      expect(detected.status === "merged" && detected.grammar).toBe("yaml");
      expect(undetected).toEqual({ status: "no_grammar", message: `No grammar claims ${paths.base}` });
    });

    it("should use an explicit grammar without detection", async () => {
      const paths = await writeRevisions(tempDir, { base: "a: 1\n", left: "a: 1\n", right: "a: 2\n" }, "tmp");
      const result = await mergeFile({ paths, grammar: "yaml" }, options);

      expect(result.status === "merged" && result.outcome).toMatchObject({ status: "clean", text: "a: 2\n" });
    });

    it("should return CRLF text when the left file uses CRLF", async () => {
      const paths = await writeRevisions(tempDir, { base: "a: 1\nb: 2\n", left: "a: 1\r\nb: 2\r\n", right: "a: 1\nb: 3\n" });
      const result = await mergeFile({ paths }, options);

      expect(result.status === "merged" && result.outcome).toMatchObject({ status: "clean", text: "a: 1\r\nb: 3\r\n" });
    });
  });

  describe("mergeFiles", () => {
    it("should merge each job in order", async () => {
      const yamlDir = await createTempDir();
      try {
        const yaml = await writeRevisions(yamlDir, { base: "a: 1\n", left: "a: 1\n", right: "a: 2\n" });
        const text = await writeRevisions(tempDir, { base: "x\n", left: "y\n", right: "x\n" }, "txt");
        const results = await mergeFiles([{ paths: yaml }, { paths: text }], options);

        expect(results.map((result) => result.status)).toEqual(["merged", "no_grammar"]);
      } finally {
        await cleanupTempDir(yamlDir);
      }
    });
  });
});
