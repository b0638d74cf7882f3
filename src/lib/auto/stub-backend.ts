/**
 * Visual Sequencer - スタブバックエンド
 * 実際のPC操作を行わず、ログ出力と記録のみ（テスト・開発用）
 */

import type { Logger } from '../core/logger';
import type { ScreenPosition } from '../core/types';
import type { InputBackend } from './controller';

export type InputCall =
  | { type: 'click'; x: number; y: number; count: number }
  | { type: 'key'; key: string };

export class StubBackend implements InputBackend {
  readonly calls: InputCall[] = [];
  private cursor: ScreenPosition = { x: 500, y: 500 };
  private logger: (message: string) => void;

  constructor(logger?: Logger) {
    const scoped = logger?.child('stub');
    this.logger = scoped ? (msg) => scoped.info(msg) : (msg) => console.log(`[Stub] ${msg}`);
  }

  async injectClick(x: number, y: number, count: number): Promise<void> {
    this.logger(`Click at (${x}, ${y})${count > 1 ? ` x${count}` : ''}`);
    this.calls.push({ type: 'click', x, y, count });
  }

  async injectKey(key: string): Promise<void> {
    this.logger(`Key: ${key}`);
    this.calls.push({ type: 'key', key });
  }

  async cursorPosition(): Promise<ScreenPosition> {
    return { ...this.cursor };
  }

  setCursor(position: ScreenPosition): void {
    this.cursor = { ...position };
  }

  clicks(): Array<{ x: number; y: number; count: number }> {
    const result: Array<{ x: number; y: number; count: number }> = [];
    for (const call of this.calls) {
      if (call.type === 'click') result.push({ x: call.x, y: call.y, count: call.count });
    }
    return result;
  }

  keys(): string[] {
    const result: string[] = [];
    for (const call of this.calls) {
      if (call.type === 'key') result.push(call.key);
    }
    return result;
  }
}
