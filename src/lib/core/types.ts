/**
 * Visual Sequencer - 型定義
 * Sequence / step / trigger model shared by the runner, the evaluator and the
 * item-scan resolver.
 */

// ========== 基本型 ==========

export interface Color {
  r: number;
  g: number;
  b: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ScreenPosition {
  x: number;
  y: number;
}

export interface Point {
  id: number;
  name: string;
  x: number;
  y: number;
}

// ========== 待機指定 ==========

export type Polarity = 'appear' | 'gone';

export interface PixelTrigger {
  x: number;
  y: number;
  color: Color;
  polarity: Polarity;
}

/**
 * 時刻指定
 *   time     - today at HH:MM, rolled to tomorrow once passed
 *   relative - now + seconds
 */
export type ClockTarget =
  | { kind: 'time'; hour: number; minute: number }
  | { kind: 'relative'; seconds: number };

export type WaitSpec =
  | { type: 'none' }
  | { type: 'fixed'; seconds: number }
  | { type: 'range'; min: number; max: number }
  | ({ type: 'pixel' } & PixelTrigger)
  | { type: 'clock'; target: ClockTarget }
  | { type: 'delayThenPixel'; seconds: number; pixel: PixelTrigger };

// ========== ELSE ==========

export type ElseAction =
  | { type: 'skip' }
  | { type: 'restart' }
  | { type: 'click'; pointId: number; delaySeconds?: number }
  | { type: 'key'; key: string };

// ========== ステップ ==========

export type ScanMode = 'all' | 'best' | 'every';

export type Comparator = '>' | '<' | '>=' | '<=' | '==' | '!=';

export type Step =
  | ClickStep
  | WaitStep
  | KeyStep
  | ScanStep
  | WaitScanStep
  | WaitNumberStep;

export interface ClickStep {
  type: 'click';
  pointId: number;
  wait: WaitSpec;
  else?: ElseAction;
}

export interface WaitStep {
  type: 'wait';
  wait: WaitSpec;
  else?: ElseAction;
}

export interface KeyStep {
  type: 'key';
  key: string;
  wait: WaitSpec;
  else?: ElseAction;
}

export interface ScanStep {
  type: 'scan';
  scanId: string;
  /** Falls back to the scan config's default mode. */
  mode?: ScanMode;
  else?: ElseAction;
}

export interface WaitScanStep {
  type: 'waitScan';
  scanId: string;
  item?: string;
  polarity: Polarity;
  else?: ElseAction;
}

export interface WaitNumberStep {
  type: 'waitNumber';
  region: Rect;
  comparator: Comparator;
  threshold: number;
  clickPointId?: number;
  /** Text color used to separate glyphs from the background. */
  textColor?: Color;
  else?: ElseAction;
}

// ========== シーケンス ==========

export interface LoopPhase {
  name: string;
  /** >= 1 */
  repeat: number;
  steps: Step[];
}

export interface Sequence {
  name: string;
  start: Step[];
  loops: LoopPhase[];
  end: Step[];
  /** >= 1; END runs once after the last cycle. */
  cycles: number;
}

export type PhaseKind = 'START' | 'LOOP' | 'END';

// ========== アイテムスキャン ==========

export interface Marker {
  /** Offset from the slot region's top-left corner. */
  dx: number;
  dy: number;
  color: Color;
}

export type MarkerPolicy = 'require-all' | { minimum: number };

export type ConfirmTarget =
  | { type: 'offset'; dx: number; dy: number }
  | { type: 'point'; x: number; y: number };

export interface ItemProfile {
  name: string;
  /** Absent: the item forms a category of its own. */
  category?: string;
  /** Lower is better, 1 = best. */
  priority: number;
  markers: Marker[];
  markerPolicy: MarkerPolicy;
  /** Template image name, resolved by the template store. */
  template?: string;
  minConfidence: number;
  confirm?: {
    target: ConfirmTarget;
    delaySeconds: number;
  };
}

export interface ItemSlot {
  name: string;
  region: Rect;
  order: number;
  /** Defaults to the region center. */
  click?: ScreenPosition;
}

export interface ItemScanConfig {
  name: string;
  slots: ItemSlot[];
  items: ItemProfile[];
  defaultMode: ScanMode;
  colorTolerance?: number;
  reverse?: boolean;
}

// ========== 実行状態 ==========

export type ExecutionStatus =
  | 'idle'
  | 'running'
  | 'paused'
  | 'stopped'
  | 'completed'
  | 'error';

export interface RunStats {
  elapsedMs: number;
  cyclesCompleted: number;
  clicks: number;
  itemsClicked: number;
  keysPressed: number;
}

export interface RunPosition {
  /** 1-based; 0 before the first cycle. */
  cycle: number;
  phase: PhaseKind | null;
  /** Index into `sequence.loops` while phase is LOOP. */
  loopIndex: number;
  /** 1-based repetition of the current loop phase. */
  loopRepetition: number;
  stepIndex: number;
}

export interface RuntimeSnapshot {
  status: ExecutionStatus;
  sequence: string | null;
  position: RunPosition;
  stats: RunStats;
}

export type RunOutcome = 'completed' | 'stopped' | 'quit' | 'failsafe' | 'failed';

export interface RunReport {
  outcome: RunOutcome;
  stats: RunStats;
  error?: {
    kind: string;
    message: string;
  };
}
