/**
 * Syntax tree consumed by the Quill engine.
 *
 * The parser that produces these nodes lives outside this package; the
 * shapes below are the contract between it and the evaluators. The small
 * constructor helpers at the bottom build trees programmatically.
 */

export interface Span {
  start: number;
  end: number;
}

export type BinaryOp =
  | '+' | '-' | '*' | '/' | '%'
  | '==' | '!=' | '<' | '<=' | '>' | '>='
  | '&&' | '||';

export type UnaryOp = '!' | '-';

export type StringPart = string | { expr: Expression };

export type Expression =
  | { kind: 'string'; parts: StringPart[]; span?: Span }
  | { kind: 'number'; value: number; span?: Span }
  | { kind: 'boolean'; value: boolean; span?: Span }
  | { kind: 'null'; span?: Span }
  | { kind: 'identifier'; name: string; span?: Span }
  | { kind: 'array'; elements: Expression[]; span?: Span }
  | { kind: 'object'; entries: ObjectEntry[]; span?: Span }
  | { kind: 'binary'; op: BinaryOp; left: Expression; right: Expression; span?: Span }
  | { kind: 'unary'; op: UnaryOp; operand: Expression; span?: Span }
  | { kind: 'member'; object: Expression; property: string; span?: Span }
  | { kind: 'index'; target: Expression; index: Expression; span?: Span }
  | { kind: 'call'; callee: Expression; args: Expression[]; span?: Span }
  | { kind: 'range'; start: Expression; end: Expression; span?: Span }
  | { kind: 'lambda'; params: string[]; body: LambdaBody; span?: Span };

export interface ObjectEntry {
  key: string;
  value: Expression;
}

export type LambdaBody =
  | { kind: 'expression'; expression: Expression }
  | { kind: 'block'; block: Block };

export type Statement =
  | { kind: 'let'; name: string; value: Expression; span?: Span }
  | { kind: 'assign'; name: string; value: Expression; span?: Span }
  | { kind: 'return'; value?: Expression; span?: Span }
  | { kind: 'if'; condition: Expression; then: Block; else?: Block; span?: Span }
  | { kind: 'expr'; expression: Expression; span?: Span };

export interface Block {
  statements: Statement[];
  span?: Span;
}

// ---- Declarations ----

export type TypeName = 'string' | 'number' | 'boolean' | 'array' | 'object' | 'any';

export interface Param {
  name: string;
  type: TypeName;
}

export type FieldType =
  | { kind: 'string' }
  | { kind: 'number' }
  | { kind: 'boolean' }
  | { kind: 'array'; items: FieldType }
  | { kind: 'object'; fields: StructField[] }
  | { kind: 'named'; name: string };

export interface StructField {
  name: string;
  type: FieldType;
}

export type OutputType =
  | { kind: 'inline'; fields: StructField[] }
  | { kind: 'named'; name: string };

export interface AgentField {
  name: string;
  value: Expression;
  span?: Span;
}

export interface AgentDecl {
  kind: 'agent';
  name: string;
  fields: AgentField[];
  tools: string[];
  output?: OutputType;
  span?: Span;
}

export interface ToolDecl {
  kind: 'tool';
  name: string;
  description?: string;
  params: Param[];
  returnType?: TypeName;
  body: Block;
  span?: Span;
}

export interface StructDecl {
  kind: 'struct';
  name: string;
  fields: StructField[];
  span?: Span;
}

export interface EnumVariantDecl {
  name: string;
  fields: string[];
}

export interface EnumDecl {
  kind: 'enum';
  name: string;
  variants: EnumVariantDecl[];
  span?: Span;
}

export type Declaration = AgentDecl | ToolDecl | StructDecl | EnumDecl;

export type ProgramItem = Declaration | Statement;

export interface Program {
  items: ProgramItem[];
}

export function isDeclaration(item: ProgramItem): item is Declaration {
  return item.kind === 'agent' || item.kind === 'tool' || item.kind === 'struct' || item.kind === 'enum';
}

// ---- Node constructors ----

export function str(...parts: StringPart[]): Expression {
  return { kind: 'string', parts };
}

export function num(value: number): Expression {
  return { kind: 'number', value };
}

export function bool(value: boolean): Expression {
  return { kind: 'boolean', value };
}

export function nul(): Expression {
  return { kind: 'null' };
}

export function ident(name: string): Expression {
  return { kind: 'identifier', name };
}

export function arr(...elements: Expression[]): Expression {
  return { kind: 'array', elements };
}

export function obj(entries: Record<string, Expression>): Expression {
  return { kind: 'object', entries: Object.entries(entries).map(([key, value]) => ({ key, value })) };
}

export function binary(op: BinaryOp, left: Expression, right: Expression): Expression {
  return { kind: 'binary', op, left, right };
}

export function unary(op: UnaryOp, operand: Expression): Expression {
  return { kind: 'unary', op, operand };
}

export function member(object: Expression, property: string): Expression {
  return { kind: 'member', object, property };
}

export function index(target: Expression, idx: Expression): Expression {
  return { kind: 'index', target, index: idx };
}

export function call(callee: Expression | string, ...args: Expression[]): Expression {
  return { kind: 'call', callee: typeof callee === 'string' ? ident(callee) : callee, args };
}

export function range(start: Expression, end: Expression): Expression {
  return { kind: 'range', start, end };
}

export function lambda(params: string[], body: Expression | Block): Expression {
  return 'statements' in body
    ? { kind: 'lambda', params, body: { kind: 'block', block: body } }
    : { kind: 'lambda', params, body: { kind: 'expression', expression: body } };
}

export function block(...statements: Statement[]): Block {
  return { statements };
}

export function letStmt(name: string, value: Expression): Statement {
  return { kind: 'let', name, value };
}

export function assign(name: string, value: Expression): Statement {
  return { kind: 'assign', name, value };
}

export function ret(value?: Expression): Statement {
  return value === undefined ? { kind: 'return' } : { kind: 'return', value };
}

export function ifStmt(condition: Expression, then: Block, otherwise?: Block): Statement {
  return otherwise === undefined
    ? { kind: 'if', condition, then }
    : { kind: 'if', condition, then, else: otherwise };
}

export function exprStmt(expression: Expression): Statement {
  return { kind: 'expr', expression };
}
