/**
 * Codegen module - transforms expression trees to target source text.
 *
 * Public exports for the code generation phase.
 */

export { render, renderModule, compilePattern } from "./codegen";
export type { RenderOptions } from "./context";
export type { CompiledPattern, PatternBinding } from "./gen-pattern";
export { ASSEMBLYSCRIPT_DIALECT } from "./dialect";
export type { Dialect, BinaryTemplate, UnaryTemplate } from "./dialect";
export { CodeBuilder } from "./code-builder";
