/**
 * Environment
 *
 * Stack of scope frames mapping names to values. The bottom frame is the
 * global frame and is never popped.
 */

import type { MuffasaValue } from './values.js';

export class Environment {
  private readonly frames: Map<string, MuffasaValue>[];

  constructor(globals?: Iterable<readonly [string, MuffasaValue]>) {
    this.frames = [new Map(globals)];
  }

  /** Number of frames on the stack, global frame included */
  get depth(): number {
    return this.frames.length;
  }

  pushFrame(): void {
    this.frames.push(new Map());
  }

  popFrame(): void {
    if (this.frames.length <= 1) {
      throw new Error('Cannot pop the global frame');
    }
    this.frames.pop();
  }

  /** Resolve a name from the innermost frame outward */
  lookup(name: string): MuffasaValue | undefined {
    return this.findFrame(name)?.get(name);
  }

  has(name: string): boolean {
    return this.findFrame(name) !== undefined;
  }

  /**
   * Bind a name.
   * Updates the innermost frame that already holds the name; otherwise
   * creates the binding in the current (innermost) frame.
   */
  assign(name: string, value: MuffasaValue): void {
    const frame = this.findFrame(name) ?? this.currentFrame();
    frame.set(name, value);
  }

  /** Global bindings as a plain record */
  snapshot(): Record<string, MuffasaValue> {
    const global = this.frames[0];
    return global ? Object.fromEntries(global) : {};
  }

  private currentFrame(): Map<string, MuffasaValue> {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) throw new Error('Environment has no frames');
    return frame;
  }

  private findFrame(name: string): Map<string, MuffasaValue> | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (frame?.has(name)) return frame;
    }
    return undefined;
  }
}
