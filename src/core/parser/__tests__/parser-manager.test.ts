/**
 * Parser Manager Tests
 *
 * @module
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { ErrorCode, ParsingError } from "../../errors.js";
import { ParserManager, createParserManager } from "../parser-manager.js";

describe("ParserManager", () => {
  let parserManager: ParserManager;

  beforeAll(async () => {
    parserManager = await createParserManager();
  });

  afterAll(async () => {
    await parserManager.close();
  });

  it("parses valid Python into a module tree", () => {
    const result = parserManager.parseSource("ok.py", "x = 1\nprint(x)\n");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.tree.rootNode.type).toBe("module");
    expect(result.value.hasErrors).toBe(false);
    expect(result.value.language).toBe("python");
    result.value.tree.delete();
  });

  it("turns a syntax error into a located ParsingError", () => {
    const result = parserManager.parseSource("broken.py", "def f(:\n    pass\n");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ParsingError);
    expect(result.error.code).toBe(ErrorCode.PARSE_SYNTAX_ERROR);
    expect(result.error.filePath).toBe("broken.py");
    expect(result.error.line).toBe(1);
  });

  it("refuses to parse before initialization", () => {
    const fresh = new ParserManager();
    expect(() => fresh.parseCode("x = 1")).toThrow(ParsingError);
  });
});
