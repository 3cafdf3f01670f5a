/**
 * Lexical scoping for the Quill engine.
 *
 * A stack of scopes, innermost last. The bottom (global) scope is never
 * popped. Absence is reported through return values; callers decide
 * which error it becomes.
 */

import type { Value } from './values';

export interface EnumVariantDef {
  name: string;
  fields: string[];
}

export interface EnumDef {
  name: string;
  variants: EnumVariantDef[];
}

type Scope = Map<string, Value>;

export class Environment {
  private scopes: Scope[];
  private enums: Map<string, EnumDef>;

  constructor() {
    this.scopes = [new Map()];
    this.enums = new Map();
  }

  /**
   * Define a variable in the innermost scope, shadowing outer bindings.
   */
  define(name: string, value: Value): void {
    this.scopes[this.scopes.length - 1].set(name, value);
  }

  get(name: string): Value | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const value = this.scopes[i].get(name);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  /**
   * Reassign a variable in the nearest scope that holds it.
   * Returns false when the name is not declared anywhere.
   */
  set(name: string, value: Value): boolean {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const scope = this.scopes[i];
      if (scope.has(name)) {
        scope.set(name, value);
        return true;
      }
    }
    return false;
  }

  contains(name: string): boolean {
    return this.get(name) !== undefined;
  }

  pushScope(): void {
    this.scopes.push(new Map());
  }

  popScope(): void {
    if (this.scopes.length > 1) {
      this.scopes.pop();
    }
  }

  depth(): number {
    return this.scopes.length;
  }

  defineEnum(def: EnumDef): void {
    this.enums.set(def.name, def);
  }

  getEnum(name: string): EnumDef | undefined {
    return this.enums.get(name);
  }

  /**
   * Snapshot for running a tool body: a shallow copy of the global scope
   * with a fresh scope on top. Block-local bindings of the caller are not
   * visible, and writes in the fork never reach this environment.
   */
  forkGlobal(): Environment {
    const child = new Environment();
    child.scopes = [new Map(this.scopes[0]), new Map()];
    child.enums = this.enums;
    return child;
  }
}
