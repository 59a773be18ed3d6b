/**
 * Core module - the parsing engine and the root parser
 * Nothing here writes to the terminal or exits the process.
 */

// Engine
export { parseCommand, classifyToken, createEngineContext } from './engine';
export type { EngineContext, TokenClass } from './engine';

// Parser
export { Parser } from './parser';
export type { ParserOptions, ParseResult } from './parser';
