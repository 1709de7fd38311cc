/**
 * ReportBuilder - walks a prototype tree and assembles the interface report
 *
 * Functions are numbered in pre-order (main chunk first). Globals keep the
 * order of their first assignment anywhere in the tree.
 */

import type { FunctionRecord, GlobalEntry, InterfaceReport, Proto } from '@luaprobe/types';
import { UNRESOLVED_FUNCTION_INDEX } from '@luaprobe/types';
import { AnalysisError, LuaProbeError } from '../errors/LuaProbeError.js';
import type { Logger } from '../logging/Logger.js';
import { silentLogger } from '../logging/Logger.js';
import { analyzeFunction, type StagedClosure } from './FunctionAnalyzer.js';

export const DEFAULT_LUA_VERSION = '5.4.7';

export interface AnalyzeOptions {
  /** Version tag written to the report */
  luaVersion?: string;
  logger?: Logger;
}

/**
 * Analyze a main-chunk prototype and everything nested in it.
 *
 * @throws AnalysisError when the walk fails; no partial report is returned
 */
export function analyzeProto(proto: Proto, options: AnalyzeOptions = {}): InterfaceReport {
  try {
    return new ReportBuilder(options).build(proto);
  } catch (err) {
    if (err instanceof LuaProbeError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new AnalysisError(
      `Analysis failed: ${reason}`,
      'ERR_ANALYSIS_INTERNAL',
      { source: proto.source },
      'Run again with --log-level debug and report the chunk'
    );
  }
}

export class ReportBuilder {
  private readonly luaVersion: string;
  private readonly logger: Logger;
  private readonly functions: FunctionRecord[] = [];
  private readonly globals: GlobalEntry[] = [];
  private readonly globalSlots = new Map<string, number>();
  /** Slots whose function index has been staged by some function */
  private readonly claimedSlots = new Set<number>();

  constructor(options: AnalyzeOptions = {}) {
    this.luaVersion = options.luaVersion ?? DEFAULT_LUA_VERSION;
    this.logger = options.logger ?? silentLogger;
  }

  build(main: Proto): InterfaceReport {
    this.visit(main);

    this.logger.debug('Analysis complete', {
      functions: this.functions.length,
      globals: this.globals.length,
    });

    return {
      luaVersion: this.luaVersion,
      functions: this.functions,
      globals: this.globals,
    };
  }

  private visit(proto: Proto): void {
    const { record, assignments } = analyzeFunction(proto);
    const index = this.functions.length;
    this.functions.push(record);

    this.logger.trace('Analyzed function', {
      index,
      source: record.source,
      lineDefined: record.lineDefined,
      returnKind: record.returnKind,
    });

    // slot -> nested function published there. The first function to stage
    // a slot owns it; inside that function a later assignment wins.
    const staged = new Map<number, StagedClosure>();
    for (const assignment of assignments) {
      const slot = this.upsertGlobal(assignment.name, assignment.isFunction, UNRESOLVED_FUNCTION_INDEX);
      if (!assignment.closure) continue;
      if (staged.has(slot) || !this.claimedSlots.has(slot)) {
        staged.set(slot, assignment.closure);
        this.claimedSlots.add(slot);
      }
    }

    for (const child of proto.protos) {
      record.childProtoIndices.push(this.functions.length);
      this.visit(child);
    }

    for (const [slot, closure] of staged) {
      const functionIndex = this.locateChild(record, closure);
      if (functionIndex === UNRESOLVED_FUNCTION_INDEX) {
        this.logger.debug('Global function left unresolved', { global: this.globals[slot].name });
        continue;
      }
      const entry = this.globals[slot];
      this.upsertGlobal(entry.name, true, functionIndex);
    }
  }

  /**
   * Record index of a staged child: by its position under the parent, or
   * by the line it was defined on when the position is not available.
   */
  private locateChild(parent: FunctionRecord, closure: StagedClosure): number {
    const byOrdinal = parent.childProtoIndices[closure.childOrdinal];
    if (byOrdinal !== undefined) return byOrdinal;

    const byLine = this.functions.findIndex((fn) => fn.lineDefined === closure.lineDefined);
    return byLine >= 0 ? byLine : UNRESOLVED_FUNCTION_INDEX;
  }

  /**
   * Insert or update a global; returns its slot.
   *
   * isFunction is only ever promoted, and only a resolved index replaces
   * the stored one.
   */
  private upsertGlobal(name: string, isFunction: boolean, functionIndex: number): number {
    const existing = this.globalSlots.get(name);

    if (existing !== undefined) {
      const entry = this.globals[existing];
      if (isFunction) entry.isFunction = true;
      if (functionIndex >= 0) entry.functionIndex = functionIndex;
      return existing;
    }

    const slot = this.globals.length;
    this.globals.push({ name, isFunction, functionIndex });
    this.globalSlots.set(name, slot);
    return slot;
  }
}
