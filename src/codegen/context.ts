/**
 * Render options and the context threaded through generation.
 */

import { ASSEMBLYSCRIPT_DIALECT, Dialect } from "./dialect";

/**
 * Options for rendering.
 */
export type RenderOptions = {
  /** Indentation string (default: "  ") */
  indent?: string;
  /** Operator tables and runtime spellings (default: AssemblyScript) */
  dialect?: Dialect;
  /** Closure parameter holding a case scrutinee (default: "_match") */
  matchVar?: string;
  /** Catch clause variable of a try expression (default: "_error") */
  errorVar?: string;
  /** Comment placed above a rendered module (default: none) */
  header?: string;
};

// Context passed during generation
export type RenderContext = {
  indent: string;
  dialect: Dialect;
  matchVar: string;
  errorVar: string;
  header?: string;
};

export function createContext(options: RenderOptions = {}): RenderContext {
  return {
    indent: options.indent ?? "  ",
    dialect: options.dialect ?? ASSEMBLYSCRIPT_DIALECT,
    matchVar: options.matchVar ?? "_match",
    errorVar: options.errorVar ?? "_error",
    header: options.header,
  };
}
