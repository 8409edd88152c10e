/**
 * Schema-Flow Engine tests
 *
 * @module
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { SchemaFlowEngine, createSchemaFlowEngine } from "../schema-flow-engine.js";

const SCHEMAS = "class UserSchema(BaseSchema):\n    user_id: int\n    email: str\n";
const PIPELINE = 'def report(df: Frame[UserSchema]) -> None:\n    df["emai"]\n';
const CLEAN = 'def report(df: Frame[UserSchema]) -> None:\n    df["email"]\n';

describe("SchemaFlowEngine", () => {
  let engine: SchemaFlowEngine;
  let tempDir: string;

  beforeAll(async () => {
    engine = await createSchemaFlowEngine({ concurrency: 2 });
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "framecheck-engine-"));
  });

  afterAll(async () => {
    await engine.close();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("checks in-memory sources across files", async () => {
    const result = await engine.run([
      { path: "schemas.py", text: SCHEMAS },
      { path: "pipeline.py", text: PIPELINE },
    ]);

    expect(result.outcome).toBe("findings");
    expect(result.filesChecked).toBe(2);
    expect(result.diagnostics).toEqual([
      {
        file: "pipeline.py",
        line: 2,
        column: 8,
        severity: "error",
        code: "UnknownColumn",
        message: "Column 'emai' does not exist in UserSchema",
        suggestion: "email",
      },
    ]);
  });

  it("succeeds when every access is declared", async () => {
    const result = await engine.run([
      { path: "schemas.py", text: SCHEMAS },
      { path: "pipeline.py", text: CLEAN },
    ]);
    expect(result.outcome).toBe("success");
    expect(result.diagnostics).toEqual([]);
  });

  it("reports unparsable files and keeps checking the rest", async () => {
    const result = await engine.run([
      { path: "schemas.py", text: SCHEMAS },
      { path: "broken.py", text: "def broken(:\n    pass\n" },
      { path: "pipeline.py", text: PIPELINE },
    ]);

    expect(result.diagnostics.map((d) => `${d.file} ${d.code}`)).toEqual([
      "broken.py ParseError",
      "pipeline.py UnknownColumn",
    ]);
    expect(result.filesChecked).toBe(3);
  });

  it("gives the same diagnostics regardless of input order and concurrency", async () => {
    const serial = new SchemaFlowEngine({ concurrency: 1 });
    await serial.initialize();
    try {
      const forward = await engine.run([
        { path: "schemas.py", text: SCHEMAS },
        { path: "pipeline.py", text: PIPELINE },
      ]);
      const reversed = await serial.run([
        { path: "pipeline.py", text: PIPELINE },
        { path: "schemas.py", text: SCHEMAS },
      ]);
      expect(reversed.diagnostics).toEqual(forward.diagnostics);
    } finally {
      await serial.close();
    }
  });

  it("warns when there is nothing to check", async () => {
    const result = await engine.run([]);
    expect(result.diagnostics).toEqual([
      {
        file: "<input>",
        line: 1,
        column: 1,
        severity: "warning",
        code: "NoFilesChecked",
        message: "No files were checked",
        suggestion: null,
      },
    ]);
    expect(result.outcome).toBe("success");
    expect((await engine.run([], { strict: true })).outcome).toBe("findings");
  });

  it("reads files relative to its base directory", async () => {
    await fs.writeFile(path.join(tempDir, "schemas.py"), SCHEMAS);
    await fs.writeFile(path.join(tempDir, "pipeline.py"), PIPELINE);

    const reader = await createSchemaFlowEngine({ baseDir: tempDir });
    try {
      const result = await reader.run([{ path: "schemas.py" }, { path: "pipeline.py" }, { path: "missing.py" }]);
      expect(result.diagnostics.map((d) => `${d.file}:${d.line}:${d.column} ${d.code}`)).toEqual([
        "missing.py:1:1 ParseError",
        "pipeline.py:2:8 UnknownColumn",
      ]);
      expect(result.diagnostics[0]?.message.startsWith("Cannot read file: ")).toBe(true);
    } finally {
      await reader.close();
    }
  });

  it("builds a registry without checking accesses", async () => {
    const snapshot = await engine.buildRegistry([
      { path: "schemas.py", text: SCHEMAS },
      { path: "broken.py", text: "class (:\n" },
    ]);

    expect(snapshot.registry.get("UserSchema")?.columns.map((column) => column.lookupKey)).toEqual([
      "user_id",
      "email",
    ]);
    expect(snapshot.diagnostics).toEqual([]);
    expect(snapshot.parseDiagnostics.map((d) => d.file)).toEqual(["broken.py"]);
  });
});
