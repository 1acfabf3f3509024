/**
 * Global function table. Functions in minipy are only ever defined at
 * top level; the table is filled before the program body runs.
 */

import { FunctionDef, SourceLoc } from './ast';
import { MiniPyNameError } from './errors';

export class FunctionTable {
  private fns = new Map<string, FunctionDef>();

  /**
   * Register a definition. A later definition of the same name replaces
   * the earlier one.
   */
  register(def: FunctionDef): void {
    this.fns.set(def.name, def);
  }

  registerAll(defs: Iterable<FunctionDef>): void {
    for (const def of defs) this.register(def);
  }

  lookup(name: string, loc?: SourceLoc): FunctionDef {
    const def = this.fns.get(name);
    if (def === undefined) {
      throw new MiniPyNameError(name, loc?.line, loc?.column, 'function');
    }
    return def;
  }

  has(name: string): boolean {
    return this.fns.has(name);
  }

  names(): string[] {
    return [...this.fns.keys()];
  }

  clear(): void {
    this.fns.clear();
  }
}
