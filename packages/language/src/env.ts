import type { Value } from '@crisp/core';
import { ArgsMismatchError, DepthLimitError } from './error.js';
import type { LispFunction } from './function.js';

export const DEFAULT_MAX_DEPTH = 500;
export const TOP_LEVEL_LABEL = 'top-level';

/** One call's bindings. Keys are symbol names; quote mode and rest are use-site properties. */
export class Closure {
  private bindings = new Map<string, Value>();

  constructor(readonly label: string) {}

  get(name: string): Value | undefined {
    return this.bindings.get(name);
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  put(name: string, value: Value): void {
    this.bindings.set(name, value);
  }
}

export interface EnvironmentOptions {
  /** Frame count past which a call fails with DepthLimitError. */
  maxDepth?: number;
  /** Sink for `debug` output. */
  print?: (text: string) => void;
}

export class Environment {
  private readonly root = new Closure(TOP_LEVEL_LABEL);
  private frames: Closure[] = [this.root];
  private functions = new Map<string, LispFunction>();
  readonly maxDepth: number;
  readonly print: (text: string) => void;

  constructor(options: EnvironmentOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.print = options.print ?? ((text) => console.log(text));
  }

  get depth(): number {
    return this.frames.length;
  }

  topLevel(): Closure {
    return this.root;
  }

  current(): Closure {
    return this.frames.at(-1) ?? this.root;
  }

  /** The frame directly below the current one. */
  caller(): Closure {
    const frame = this.frames.at(-2);
    if (frame === undefined) {
      throw new ArgsMismatchError(this.current().label, 'no calling frame to bind into');
    }
    return frame;
  }

  findClosure(name: string): Closure | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (frame?.has(name)) return frame;
    }
    return undefined;
  }

  lookup(name: string): Value | undefined {
    return this.findClosure(name)?.get(name);
  }

  pushFrame(label: string): Closure {
    if (this.frames.length >= this.maxDepth) {
      throw new DepthLimitError(this.maxDepth, label);
    }
    const frame = new Closure(label);
    this.frames.push(frame);
    return frame;
  }

  popFrame(): void {
    if (this.frames.length > 1) {
      this.frames.pop();
    }
  }

  /** Frame labels, outermost first. */
  labels(): string[] {
    return this.frames.map((frame) => frame.label);
  }

  defineFunction(name: string, fn: LispFunction): void {
    this.functions.set(name, fn);
  }

  getFunction(name: string): LispFunction | undefined {
    return this.functions.get(name);
  }

  functionNames(): string[] {
    return [...this.functions.keys()];
  }
}
