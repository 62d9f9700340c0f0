/**
 * Environment
 *
 * A frame of name to value bindings with an optional enclosing frame.
 * Frames are shared by reference between the interpreter's current
 * pointer and every closure that captured them.
 */

import type { LuxValue } from './values.js';

export class Environment {
  private readonly values = new Map<string, LuxValue>();

  constructor(readonly parent: Environment | null = null) {}

  /** New child frame enclosed by this one */
  extend(): Environment {
    return new Environment(this);
  }

  /** Bind in this frame, replacing any existing binding */
  define(name: string, value: LuxValue): void {
    this.values.set(name, value);
  }

  /** Look up through the chain; `undefined` when no frame binds the name */
  get(name: string): LuxValue | undefined {
    for (let env: Environment | null = this; env; env = env.parent) {
      if (env.values.has(name)) return env.values.get(name);
    }
    return undefined;
  }

  /** Rebind the nearest existing binding. Returns false when none exists. */
  assign(name: string, value: LuxValue): boolean {
    for (let env: Environment | null = this; env; env = env.parent) {
      if (env.values.has(name)) {
        env.values.set(name, value);
        return true;
      }
    }
    return false;
  }

  /** The frame `depth` parents up; 0 is this frame */
  ancestor(depth: number): Environment {
    let env: Environment = this;
    for (let i = 0; i < depth; i++) {
      if (!env.parent) {
        throw new Error(`Environment chain shorter than depth ${depth}`);
      }
      env = env.parent;
    }
    return env;
  }

  /** Read from exactly the frame at `depth`, without searching further */
  getAt(name: string, depth: number): LuxValue | undefined {
    const frame = this.ancestor(depth).values;
    return frame.has(name) ? frame.get(name) : undefined;
  }

  assignAt(name: string, value: LuxValue, depth: number): void {
    this.ancestor(depth).values.set(name, value);
  }
}
