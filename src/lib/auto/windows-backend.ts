/**
 * Visual Sequencer - Windows ネイティブバックエンド
 * PowerShell経由でWindows APIを呼び出す（ネイティブモジュール不要）
 *
 * 入力: SetCursorPos + mouse_event / SendKeys
 * 画面: Graphics.CopyFromScreen → 一時PNG → Jimp
 *
 * 制約:
 *   - Windows専用
 *   - PowerShell起動のオーバーヘッド（呼び出しごと）
 */

import { execFile } from 'child_process';
import Jimp from 'jimp';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { Logger } from '../core/logger';
import type { Color, Rect, ScreenPosition } from '../core/types';
import type { InputBackend } from './controller';
import { pixelAt, type PixelBuffer, type ScreenSource } from './screen';

/**
 * PowerShellコマンドを実行
 */
function runPowerShell(script: string): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile('powershell.exe', [
      '-NoProfile',
      '-NonInteractive',
      '-ExecutionPolicy', 'Bypass',
      '-Command', script,
    ], { timeout: 10000 }, (error, stdout, stderr) => {
      if (error) {
        reject(new Error(`PowerShell error: ${error.message}\n${stderr}`));
      } else {
        resolve(stdout.trim());
      }
    });
  });
}

/**
 * C# コードを使ったWindows API呼び出し用のヘルパー
 */
const CSHARP_HELPER = `
Add-Type -TypeDefinition @'
using System;
using System.Drawing;
using System.Drawing.Imaging;
using System.Runtime.InteropServices;
using System.Windows.Forms;
using System.Threading;

public class VSeqInput {
    [StructLayout(LayoutKind.Sequential)]
    public struct POINT { public int X; public int Y; }

    [DllImport("user32.dll")]
    static extern bool SetCursorPos(int X, int Y);

    [DllImport("user32.dll")]
    static extern bool GetCursorPos(out POINT lpPoint);

    [DllImport("user32.dll")]
    static extern void mouse_event(uint dwFlags, int dx, int dy, uint dwData, int dwExtraInfo);

    const uint MOUSEEVENTF_LEFTDOWN = 0x0002;
    const uint MOUSEEVENTF_LEFTUP = 0x0004;

    public static void Click(int x, int y, int count) {
        SetCursorPos(x, y);
        Thread.Sleep(50);
        for (int i = 0; i < count; i++) {
            mouse_event(MOUSEEVENTF_LEFTDOWN, 0, 0, 0, 0);
            Thread.Sleep(30);
            mouse_event(MOUSEEVENTF_LEFTUP, 0, 0, 0, 0);
            if (i < count - 1) Thread.Sleep(50);
        }
    }

    public static string Cursor() {
        POINT p;
        GetCursorPos(out p);
        return p.X + "," + p.Y;
    }

    public static void SendKey(string key) {
        SendKeys.SendWait(key);
    }

    public static void Capture(int x, int y, int w, int h, string file) {
        using (Bitmap bmp = new Bitmap(w, h)) {
            using (Graphics g = Graphics.FromImage(bmp)) {
                g.CopyFromScreen(x, y, 0, 0, new Size(w, h));
            }
            bmp.Save(file, ImageFormat.Png);
        }
    }
}
'@ -ReferencedAssemblies System.Windows.Forms, System.Drawing
`;

/**
 * SendKeys用のキーマッピング
 */
const KEY_MAP: Record<string, string> = {
  'Enter': '{ENTER}',
  'Tab': '{TAB}',
  'Escape': '{ESC}',
  'Esc': '{ESC}',
  'Backspace': '{BACKSPACE}',
  'Delete': '{DELETE}',
  'Del': '{DELETE}',
  'Home': '{HOME}',
  'End': '{END}',
  'PageUp': '{PGUP}',
  'PageDown': '{PGDN}',
  'Up': '{UP}',
  'Down': '{DOWN}',
  'Left': '{LEFT}',
  'Right': '{RIGHT}',
  'F1': '{F1}', 'F2': '{F2}', 'F3': '{F3}', 'F4': '{F4}',
  'F5': '{F5}', 'F6': '{F6}', 'F7': '{F7}', 'F8': '{F8}',
  'F9': '{F9}', 'F10': '{F10}', 'F11': '{F11}', 'F12': '{F12}',
  'Space': ' ',
  'Insert': '{INSERT}',
  'PrintScreen': '{PRTSC}',
};

/**
 * SendKeysのモディファイアマッピング
 */
const MODIFIER_MAP: Record<string, string> = {
  'Ctrl': '^',
  'Control': '^',
  'Alt': '%',
  'Shift': '+',
};

const KEY_LOOKUP = lowerKeys(KEY_MAP);
const MODIFIER_LOOKUP = lowerKeys(MODIFIER_MAP);

function lowerKeys(map: Record<string, string>): Map<string, string> {
  return new Map(Object.entries(map).map(([k, v]) => [k.toLowerCase(), v]));
}

// ── スクリプト生成 ────────────────────────────────────

/**
 * Translates `Enter`, `f5`, `a`, `ctrl+s` or `Ctrl+Shift+Tab` into SendKeys
 * notation. Lookup is case-insensitive.
 */
export function toSendKeys(key: string): string {
  const parts = key.split('+').map(p => p.trim()).filter(p => p.length > 0);
  if (parts.length === 0) {
    throw new Error(`Empty key: '${key}'`);
  }

  let prefix = '';
  const last = parts[parts.length - 1];
  for (const part of parts.slice(0, -1)) {
    const modifier = MODIFIER_LOOKUP.get(part.toLowerCase());
    if (!modifier) {
      throw new Error(`Unknown modifier '${part}' in '${key}'`);
    }
    prefix += modifier;
  }

  const mapped = KEY_LOOKUP.get(last.toLowerCase());
  if (mapped) return prefix + mapped;
  if (last.length === 1) return prefix + escapeSendKeys(prefix ? last.toLowerCase() : last);
  throw new Error(`Unknown key '${last}'`);
}

function escapeSendKeys(char: string): string {
  return /[+^%~(){}[\]]/.test(char) ? `{${char}}` : char;
}

function quote(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}

export function buildClickScript(x: number, y: number, count: number): string {
  return `${CSHARP_HELPER}\n[VSeqInput]::Click(${Math.round(x)}, ${Math.round(y)}, ${count})`;
}

export function buildKeyScript(key: string): string {
  return `${CSHARP_HELPER}\n[VSeqInput]::SendKey(${quote(toSendKeys(key))})`;
}

export function buildCursorScript(): string {
  return `${CSHARP_HELPER}\n[VSeqInput]::Cursor()`;
}

export function buildCaptureScript(rect: Rect, file: string): string {
  return `${CSHARP_HELPER}\n[VSeqInput]::Capture(${rect.x}, ${rect.y}, ${rect.width}, ${rect.height}, ${quote(file)})`;
}

/** Parses the `x,y` line written by the cursor script. */
export function parseCursorOutput(output: string): ScreenPosition {
  const match = /^(-?\d+),(-?\d+)$/.exec(output.trim());
  if (!match) {
    throw new Error(`Unexpected cursor output: '${output}'`);
  }
  return { x: parseInt(match[1], 10), y: parseInt(match[2], 10) };
}

// ── バックエンド ──────────────────────────────────────

/**
 * Windows ネイティブバックエンド（入力 + 画面キャプチャ）
 */
export class WindowsBackend implements InputBackend, ScreenSource {
  private logger: (message: string) => void;
  private captureSeq = 0;

  constructor(logger?: Logger) {
    const scoped = logger?.child('windows');
    this.logger = scoped ? (msg) => scoped.debug(msg) : (msg) => console.log(`[Windows] ${msg}`);
  }

  async injectClick(x: number, y: number, count: number): Promise<void> {
    this.logger(`Click at (${x}, ${y}) x${count}`);
    await runPowerShell(buildClickScript(x, y, count));
  }

  async injectKey(key: string): Promise<void> {
    this.logger(`Key: ${key}`);
    await runPowerShell(buildKeyScript(key));
  }

  async cursorPosition(): Promise<ScreenPosition> {
    return parseCursorOutput(await runPowerShell(buildCursorScript()));
  }

  async captureRegion(rect: Rect): Promise<PixelBuffer> {
    const file = path.join(os.tmpdir(), `vseq-capture-${process.pid}-${this.captureSeq++}.png`);
    try {
      await runPowerShell(buildCaptureScript(rect, file));
      const image = await Jimp.read(file);
      return image.bitmap;
    } finally {
      fs.rmSync(file, { force: true });
    }
  }

  async readPixel(x: number, y: number): Promise<Color> {
    const region = await this.captureRegion({ x, y, width: 1, height: 1 });
    return pixelAt(region, 0, 0) ?? { r: 0, g: 0, b: 0 };
  }
}
