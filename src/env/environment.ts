/**
 * Variable storage for the interpreter: an arena of lexical scopes.
 */

import { NameError } from "../errors/errors.js";
import type { RuntimeValue } from "../object/object.js";

/**
 * One scope in the arena.
 */
interface Scope {
  /** Bindings declared in this scope, by name. */
  readonly bindings: Map<string, RuntimeValue>;
  /** Index of the enclosing scope (null for the root). */
  readonly parent: number | null;
}

/**
 * Scopes live in an array and refer to their parent by index. Block
 * scopes are strictly nested, so the current scope is always the last
 * entry and leaving it pops the arena.
 */
export class Environment {
  private scopes: Scope[] = [{ bindings: new Map(), parent: null }];
  private current = 0;

  /** Number of scopes on the current chain, root included. */
  get depth(): number {
    let count = 0;
    for (let index: number | null = this.current; index !== null; index = this.scope(index).parent) {
      count++;
    }
    return count;
  }

  private scope(index: number): Scope {
    const scope = this.scopes[index];
    if (scope === undefined) {
      throw new Error(`scope ${index} does not exist`);
    }
    return scope;
  }

  /**
   * Find the nearest scope that binds the name.
   */
  private lookup(name: string): Scope | undefined {
    for (let index: number | null = this.current; index !== null; ) {
      const scope = this.scope(index);
      if (scope.bindings.has(name)) {
        return scope;
      }
      index = scope.parent;
    }
    return undefined;
  }

  /**
   * Bind a new name in the current scope.
   */
  declare(name: string, value: RuntimeValue): void {
    const scope = this.scope(this.current);
    if (scope.bindings.has(name)) {
      throw new NameError(`variable '${name}' is already declared`);
    }
    scope.bindings.set(name, value);
  }

  /**
   * Overwrite the nearest existing binding.
   */
  assign(name: string, value: RuntimeValue): void {
    const scope = this.lookup(name);
    if (scope === undefined) {
      throw new NameError(`cannot assign to undeclared variable '${name}'`);
    }
    scope.bindings.set(name, value);
  }

  /**
   * Read the nearest binding of a name.
   */
  resolve(name: string): RuntimeValue {
    const value = this.lookup(name)?.bindings.get(name);
    if (value === undefined) {
      throw new NameError(`undefined variable '${name}'`);
    }
    return value;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /**
   * Push a child of the current scope and make it current.
   * Returns the new scope's index.
   */
  enterScope(): number {
    this.scopes.push({ bindings: new Map(), parent: this.current });
    this.current = this.scopes.length - 1;
    return this.current;
  }

  /**
   * Discard the current scope and return to its parent.
   */
  exitScope(): void {
    const parent = this.scope(this.current).parent;
    if (parent === null) {
      throw new Error("cannot exit the root scope");
    }
    this.scopes.pop();
    this.current = parent;
  }

  /**
   * Bindings of the root scope in declaration order.
   */
  globals(): [string, RuntimeValue][] {
    return [...this.scope(0).bindings.entries()];
  }

  /**
   * Drop every binding and nested scope.
   */
  reset(): void {
    this.scopes = [{ bindings: new Map(), parent: null }];
    this.current = 0;
  }
}
