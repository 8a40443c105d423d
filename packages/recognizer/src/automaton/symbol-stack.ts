import type { StackSymbol } from './stack-symbol.js';

/**
 * Explicit stack of pending grammar obligations.
 *
 * The top of the stack is the last element.
 */
export class SymbolStack<S extends string, T extends string> {
  private symbols: StackSymbol<S, T>[] = [];

  push(symbol: StackSymbol<S, T>): void {
    this.symbols.push(symbol);
  }

  /**
   * Push a production so that its first symbol ends up on top.
   */
  pushProduction(production: readonly StackSymbol<S, T>[]): void {
    for (let i = production.length - 1; i >= 0; i--) {
      this.symbols.push(production[i]);
    }
  }

  /**
   * Remove and return the top symbol, or undefined if the stack is empty
   */
  pop(): StackSymbol<S, T> | undefined {
    return this.symbols.pop();
  }

  /** Copy of the contents, bottom first */
  snapshot(): StackSymbol<S, T>[] {
    return [...this.symbols];
  }

  /** Copy of the contents, top first */
  topDown(): StackSymbol<S, T>[] {
    return [...this.symbols].reverse();
  }
}
