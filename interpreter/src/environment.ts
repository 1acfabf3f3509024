/**
 * Variable bindings for one activation of the minipy interpreter.
 *
 * An environment belongs to a single function call (or to the top-level
 * program). Assignment replaces a binding outright, so a lookup always
 * sees the most recent value. There is no parent chain: functions only
 * see what the call linkage puts into their environment.
 */

import { MiniPyValue } from './values';
import { MiniPyNameError } from './errors';

export class Environment {
  private vars: Map<string, MiniPyValue>;

  constructor(bindings?: Iterable<[string, MiniPyValue]>) {
    this.vars = new Map(bindings);
  }

  /**
   * Look up a variable by name.
   */
  get(name: string): MiniPyValue {
    const value = this.vars.get(name);
    if (value === undefined) {
      throw new MiniPyNameError(name);
    }
    return value;
  }

  has(name: string): boolean {
    return this.vars.has(name);
  }

  /**
   * Bind or rebind a variable.
   */
  set(name: string, value: MiniPyValue): void {
    this.vars.set(name, value);
  }

  /**
   * Shallow copy: the bindings are new, list values stay shared.
   */
  copy(): Environment {
    return new Environment(this.vars);
  }

  entries(): [string, MiniPyValue][] {
    return [...this.vars.entries()];
  }

  get size(): number {
    return this.vars.size;
  }
}
