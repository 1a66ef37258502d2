import type { Point } from '../types/index.js';

/**
 * Input injection used by script actions. Implementations must be safe to
 * share between concurrently running scripts.
 */
export interface AutomationEngine {
  click(x: number, y: number): Promise<void>;
  doubleClick(x: number, y: number): Promise<void>;
  rightClick(x: number, y: number): Promise<void>;
  typeText(text: string): Promise<void>;
  /** Key combination such as `CTRL+SHIFT+S` or `ENTER`. */
  sendKeys(keys: string): Promise<void>;
  wait(milliseconds: number, signal?: AbortSignal): Promise<void>;
  moveMouse(x: number, y: number): Promise<void>;
  drag(from: Point, to: Point): Promise<void>;
  getMousePosition(): Point;
  setTargetWindow(handle: string): void;
  clearTargetWindow(): void;
  readonly hasTargetWindow: boolean;
}
