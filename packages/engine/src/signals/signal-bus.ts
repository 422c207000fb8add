// Signal Bus - scene lifecycle notifications

import type { SceneEvent } from "../scene/scene-manager";

export const SCENE_SIGNALS = [
  "scene.loaded",
  "scene.instantiated",
  "scene.uninstantiated",
  "scene.activated",
  "scene.transition.failed",
  "scene.transition.rollback",
] as const;

export type SceneSignal = (typeof SCENE_SIGNALS)[number];

export type SceneListener = (event: SceneEvent, signal: SceneSignal) => void;

interface Subscription {
  pattern: RegExp;
  listener: SceneListener;
}

// "scene.*" matches one segment after "scene.", "scene.**" any number of them
function compilePattern(pattern: string): RegExp {
  const source = pattern
    .split(".")
    .map((segment) => {
      if (segment === "**") return ".*";
      if (segment === "*") return "[^.]+";
      return segment.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    })
    .join("\\.");
  return new RegExp(`^${source}$`);
}

export class SignalBus {
  private subscriptions: Map<number, Subscription> = new Map();
  private nextId = 1;

  /** Subscribe to signals matching `pattern`; returns an id for off() */
  on(pattern: string, listener: SceneListener): number {
    const id = this.nextId++;
    this.subscriptions.set(id, { pattern: compilePattern(pattern), listener });
    return id;
  }

  off(id: number): boolean {
    return this.subscriptions.delete(id);
  }

  emit(signal: SceneSignal, event: SceneEvent): void {
    for (const { pattern, listener } of [...this.subscriptions.values()]) {
      if (!pattern.test(signal)) continue;
      try {
        listener(event, signal);
      } catch (error) {
        console.error(`[keystone] listener for ${signal} failed:`, error);
      }
    }
  }
}
