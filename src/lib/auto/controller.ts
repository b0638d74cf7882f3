/**
 * Visual Sequencer - 入力コントローラー
 * マウス・キーボード操作の抽象インターフェース
 *
 * バックエンドを差し替え可能にするための設計:
 *   - WindowsBackend: PowerShell 経由の Windows API（実際のPC操作）
 *   - StubBackend: ログ出力のみ（テスト・開発用）
 */

import type { EngineConfig } from '../core/config';
import type { FailSafeProbe } from '../core/control';
import { InjectionFailureError } from '../core/errors';
import { Logger, silentLogger } from '../core/logger';
import type { ScreenPosition } from '../core/types';

export interface InputBackend {
  /** Moves to (x, y) and clicks the left button `count` times. */
  injectClick(x: number, y: number, count: number): Promise<void>;
  injectKey(key: string): Promise<void>;
  cursorPosition(): Promise<ScreenPosition>;
}

/**
 * PC操作コントローラー
 *
 * One call is one logical click: the backend repeats the physical click
 * `clicksPerPoint` times, then the post-click delay runs. Backend failures
 * surface as InjectionFailureError.
 */
export class AutoController {
  private backend: InputBackend;
  private readonly config: EngineConfig;
  private readonly log: Logger;
  private lastFailSafeCheck = 0;
  private lastFailSafeResult = false;

  constructor(backend: InputBackend, config: EngineConfig, logger: Logger = silentLogger()) {
    this.backend = backend;
    this.config = config;
    this.log = logger.child('input');
  }

  async click(x: number, y: number): Promise<void> {
    const count = this.config.clicks.clicksPerPoint;
    this.log.debug(`click (${x}, ${y}) x${count}`);
    try {
      await this.backend.injectClick(x, y, count);
    } catch (error) {
      throw new InjectionFailureError(`click at (${x}, ${y})`, error);
    }
    if (this.config.clicks.postClickDelayMs > 0) {
      await sleep(this.config.clicks.postClickDelayMs);
    }
  }

  async key(key: string): Promise<void> {
    this.log.debug(`key ${key}`);
    try {
      await this.backend.injectKey(key);
    } catch (error) {
      throw new InjectionFailureError(`key '${key}'`, error);
    }
  }

  /**
   * True while the pointer sits in the top-left fail-safe corner. The
   * backend is asked at most once per `failsafe.checkIntervalMs`.
   */
  async isFailSafeTriggered(): Promise<boolean> {
    const { enabled, x, y, checkIntervalMs } = this.config.failsafe;
    if (!enabled) return false;

    const now = Date.now();
    if (this.lastFailSafeCheck > 0 && now - this.lastFailSafeCheck < checkIntervalMs) {
      return this.lastFailSafeResult;
    }

    let position: ScreenPosition;
    try {
      position = await this.backend.cursorPosition();
    } catch (error) {
      throw new InjectionFailureError('cursor position read', error);
    }

    this.lastFailSafeCheck = now;
    this.lastFailSafeResult = position.x <= x && position.y <= y;
    if (this.lastFailSafeResult) {
      this.log.warn(`fail-safe: pointer at (${position.x}, ${position.y})`);
    }
    return this.lastFailSafeResult;
  }

  failSafeProbe(): FailSafeProbe {
    return () => this.isFailSafeTriggered();
  }

  /**
   * バックエンドを切り替え
   */
  setBackend(backend: InputBackend): void {
    this.backend = backend;
    this.lastFailSafeCheck = 0;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
