export interface ValueBinding<T> {
  type: T;
  /** Consts, functions and loop variables cannot be assigned. */
  constant: boolean;
  /** Set on bindings introduced by a function declaration or builtin. */
  callable?: boolean;
}

type Frame<V> = Map<string, V>;

/**
 * Bindings as a stack of frames. The root frame holds the global
 * declarations; `enterScope`/`exitScope` bracket every nested body, and
 * lookups walk from the innermost frame outward.
 */
export class SymbolTable<V> {
  private readonly frames: Frame<V>[] = [new Map()];

  private currentFrame(): Frame<V> {
    const frame = this.frames.at(-1);
    if (frame === undefined) {
      throw new Error("symbol table scope stack underflow");
    }

    return frame;
  }

  enterScope(): void {
    this.frames.push(new Map());
  }

  exitScope(): void {
    if (this.frames.length <= 1) {
      throw new Error("attempted to exit root scope");
    }

    this.frames.pop();
  }

  withScope<R>(fn: () => R): R {
    this.enterScope();
    try {
      return fn();
    } finally {
      this.exitScope();
    }
  }

  /** Returns false, leaving the table unchanged, when the current frame already binds `name`. */
  declare(name: string, value: V): boolean {
    const frame = this.currentFrame();
    if (frame.has(name)) return false;
    frame.set(name, value);
    return true;
  }

  resolve(name: string): V | undefined {
    for (let index = this.frames.length - 1; index >= 0; index -= 1) {
      const hit = this.frames[index]?.get(name);
      if (hit !== undefined) return hit;
    }

    return undefined;
  }
}
