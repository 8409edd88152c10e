/**
 * Schema-Flow Engine
 *
 * Runs a check in two phases separated by a barrier:
 *
 * 1. Parse every file and collect its schema declarations (parallel).
 * 2. Build and freeze the schema registry, then resolve bindings and judge
 *    column accesses in every file (parallel, registry read-only).
 *
 * Each task returns its own diagnostics; they are merged and ordered only
 * after the phase completes. Internal faults abort the run and surface as
 * an `internal-failure` outcome; every other problem is a diagnostic.
 *
 * @module
 */

import * as path from "node:path";
import type { Diagnostic, InternalFault, RunResult, SourceFile, SourceLocation } from "../../types/index.js";
import { createLogger, readFileWithEncoding, type Logger } from "../../utils/index.js";
import { checkModule } from "../checker/file-checker.js";
import { createDiagnostic, diagnosticFromError } from "../diagnostics/diagnostic.js";
import { wrapInternalFault, type InternalFaultError } from "../errors.js";
import { ParserManager, type ParseResult, type ParserManagerOptions } from "../parser/parser-manager.js";
import { collectDeclarations, type FileDeclarations } from "../registry/declarations.js";
import { loadFrameMembers } from "../registry/frame-members.js";
import { buildSchemaRegistry, type RegistryBuildResult } from "../registry/schema-registry.js";
import { computeOutcome, sortDiagnostics } from "../reporter/diagnostic-reporter.js";
import type { ResolverContext } from "../resolver/binding-resolver.js";
import { InProcessWorkerPool, type WorkerResult } from "./worker-pool.js";

// =============================================================================
// Types
// =============================================================================

export interface EngineOptions {
  /** Maximum files processed at once */
  concurrency?: number;
  /** Directory relative file paths are read from; defaults to the working directory */
  baseDir?: string;
  logger?: Logger;
  parser?: ParserManagerOptions;
}

export interface RunOptions {
  /** Treat warnings as failures */
  strict?: boolean;
}

/**
 * A file to check: its text, or a path to read it from
 */
export type SourceInput = SourceFile | { path: string; text?: undefined };

/**
 * Phase 1 output for one file
 */
interface ParsedFile {
  file: string;
  parsed: ParseResult | null;
  declarations: FileDeclarations | null;
  diagnostics: Diagnostic[];
}

export interface RegistrySnapshot extends RegistryBuildResult {
  /** ParseError diagnostics of files left out of the registry */
  parseDiagnostics: Diagnostic[];
}

// =============================================================================
// Engine
// =============================================================================

/**
 * @example
 * ```typescript
 * const engine = new SchemaFlowEngine({ concurrency: 4 });
 * await engine.initialize();
 * const result = await engine.run([{ path: "pipeline.py" }], { strict: false });
 * await engine.close();
 * ```
 */
export class SchemaFlowEngine {
  private readonly parserManager: ParserManager;
  private readonly logger: Logger;
  private readonly concurrency: number | undefined;
  private readonly baseDir: string | undefined;

  constructor(options: EngineOptions = {}) {
    this.parserManager = new ParserManager(options.parser);
    this.logger = options.logger ?? createLogger("engine");
    this.concurrency = options.concurrency;
    this.baseDir = options.baseDir;
  }

  async initialize(): Promise<void> {
    await this.parserManager.initialize();
  }

  async close(): Promise<void> {
    await this.parserManager.close();
  }

  /**
   * Phase 1 plus the registry build, for hosts that only need schemas.
   */
  async buildRegistry(files: readonly SourceInput[]): Promise<RegistrySnapshot> {
    const parsed = await this.parseAll(files);
    try {
      return { ...this.buildFrom(parsed), parseDiagnostics: parsed.flatMap((p) => p.diagnostics) };
    } finally {
      releaseTrees(parsed);
    }
  }

  /**
   * Checks every file. Never throws for problems in the analysed code.
   */
  async run(files: readonly SourceInput[], options: RunOptions = {}): Promise<RunResult> {
    const startTime = performance.now();
    const strict = options.strict ?? false;

    if (files.length === 0) {
      const diagnostics = [
        createDiagnostic({ file: "<input>", line: 1, column: 1 }, "warning", "NoFilesChecked", "No files were checked"),
      ];
      return {
        outcome: computeOutcome(diagnostics, strict),
        diagnostics,
        filesChecked: 0,
        durationMs: performance.now() - startTime,
      };
    }

    let parsed: ParsedFile[] = [];
    try {
      parsed = await this.parseAll(files);
      const { registry, diagnostics: registryDiagnostics } = this.buildFrom(parsed);
      const context: ResolverContext = { registry, frameMembers: loadFrameMembers() };

      const checkStart = performance.now();
      const checkDiagnostics = await this.checkAll(parsed, context);
      this.logger.debug(
        { files: parsed.length, durationMs: Math.round(performance.now() - checkStart) },
        "Phase 2 complete"
      );

      const diagnostics = sortDiagnostics([
        ...parsed.flatMap((p) => p.diagnostics),
        ...registryDiagnostics,
        ...checkDiagnostics,
      ]);
      return {
        outcome: computeOutcome(diagnostics, strict),
        diagnostics,
        filesChecked: files.length,
        durationMs: performance.now() - startTime,
      };
    } catch (error) {
      const fault = wrapInternalFault(error);
      this.logger.error({ err: fault, filePath: fault.filePath, construct: fault.construct }, "Internal fault");
      return {
        outcome: "internal-failure",
        diagnostics: [],
        filesChecked: files.length,
        durationMs: performance.now() - startTime,
        fault: toFault(fault),
      };
    } finally {
      releaseTrees(parsed);
    }
  }

  // ==========================================================================
  // Phases
  // ==========================================================================

  private async parseAll(files: readonly SourceInput[]): Promise<ParsedFile[]> {
    const startTime = performance.now();
    const pool = new InProcessWorkerPool<SourceInput, ParsedFile>((input) => this.parseOne(input), {
      maxWorkers: this.concurrency,
    });

    const results = await pool.submitBatch(files.map((input) => ({ id: input.path, input })));
    await pool.shutdown();

    if (results.some((result) => !result.success)) {
      releaseTrees(results.flatMap((result) => (result.success ? [result.output] : [])));
    }
    const parsed = collectOutputs(results);
    this.logger.debug(
      {
        files: parsed.length,
        failed: parsed.filter((p) => p.parsed === null).length,
        durationMs: Math.round(performance.now() - startTime),
      },
      "Phase 1 complete"
    );
    return parsed;
  }

  private buildFrom(parsed: readonly ParsedFile[]): RegistryBuildResult {
    const startTime = performance.now();
    const declarations = parsed.flatMap((p) => (p.declarations ? [p.declarations] : []));
    const result = buildSchemaRegistry(declarations, { reservedNames: loadFrameMembers() });
    this.logger.debug(
      { schemas: result.registry.size, durationMs: Math.round(performance.now() - startTime) },
      "Registry built"
    );
    return result;
  }

  private async checkAll(parsed: readonly ParsedFile[], context: ResolverContext): Promise<Diagnostic[]> {
    const checkable = parsed.flatMap((p) => (p.parsed ? [{ file: p.file, parsed: p.parsed }] : []));
    const pool = new InProcessWorkerPool<{ file: string; parsed: ParseResult }, Diagnostic[]>(
      ({ file, parsed: result }) => checkModule(result.tree.rootNode, file, context),
      { maxWorkers: this.concurrency }
    );

    const results = await pool.submitBatch(checkable.map((input) => ({ id: input.file, input })));
    await pool.shutdown();
    return collectOutputs(results).flat();
  }

  private async parseOne(input: SourceInput): Promise<ParsedFile> {
    const file = input.path;
    let text: string;
    if (input.text !== undefined) {
      text = input.text;
    } else {
      try {
        text = await readFileWithEncoding(path.resolve(this.baseDir ?? process.cwd(), file));
      } catch (error) {
        const message = `Cannot read file: ${error instanceof Error ? error.message : String(error)}`;
        this.logger.info({ filePath: file }, message);
        return {
          file,
          parsed: null,
          declarations: null,
          diagnostics: [createDiagnostic({ file, line: 1, column: 1 }, "error", "ParseError", message)],
        };
      }
    }

    const result = this.parserManager.parseSource(file, text);
    if (!result.ok) {
      const location: SourceLocation = { file, line: result.error.line ?? 1, column: result.error.column ?? 1 };
      this.logger.info({ filePath: file, line: location.line }, "Parse failed");
      return {
        file,
        parsed: null,
        declarations: null,
        diagnostics: [diagnosticFromError(result.error, "ParseError", location)],
      };
    }

    return {
      file,
      parsed: result.value,
      declarations: collectDeclarations(result.value.tree.rootNode, file),
      diagnostics: [],
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Outputs in task order; the first failed task aborts the run.
 */
function collectOutputs<T>(results: readonly WorkerResult<T>[]): T[] {
  const outputs: T[] = [];
  for (const result of results) {
    if (!result.success) {
      throw wrapInternalFault(result.error, { filePath: result.taskId });
    }
    outputs.push(result.output);
  }
  return outputs;
}

function releaseTrees(parsed: readonly ParsedFile[]): void {
  for (const file of parsed) {
    file.parsed?.tree.delete();
    file.parsed = null;
  }
}

function toFault(error: InternalFaultError): InternalFault {
  return {
    message: error.message,
    code: error.code,
    ...(error.filePath !== undefined ? { filePath: error.filePath } : {}),
    ...(error.construct !== undefined ? { construct: error.construct } : {}),
  };
}

/**
 * Creates and initializes an engine.
 */
export async function createSchemaFlowEngine(options?: EngineOptions): Promise<SchemaFlowEngine> {
  const engine = new SchemaFlowEngine(options);
  await engine.initialize();
  return engine;
}
