/**
 * Visual Sequencer - エラー定義
 *
 *   TriggerTimeout    - pixel / number / scan wait ran out of time (ELSE may recover)
 *   NoMatchFound      - scan step found no item (ELSE may recover)
 *   MissingReference  - step names an unknown point / scan; rejected at load
 *   InjectionFailure  - click or key primitive failed; fatal, no retry
 *   FailSafeTriggered - pointer entered the fail-safe corner; treated as stop
 *   AbortRequested    - stop / quit from the control layer
 */

export type ErrorKind =
  | 'TriggerTimeout'
  | 'NoMatchFound'
  | 'MissingReference'
  | 'InjectionFailure'
  | 'FailSafeTriggered'
  | 'AbortRequested';

export interface StepLocation {
  phase: string;
  stepIndex: number;
}

export interface ErrorDetail {
  kind: ErrorKind;
  message: string;
  location?: StepLocation;
  timestamp: string;
}

export class AutomationError extends Error {
  readonly kind: ErrorKind;
  location?: StepLocation;
  readonly timestamp: string;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${kind}Error`;
    this.kind = kind;
    this.timestamp = new Date().toISOString();
  }

  /** Attaches the step that raised the error, keeping the first one set. */
  at(location: StepLocation): this {
    if (!this.location) this.location = location;
    return this;
  }

  get detail(): ErrorDetail {
    return {
      kind: this.kind,
      message: this.message,
      location: this.location,
      timestamp: this.timestamp,
    };
  }
}

export type TriggerKind = 'pixel' | 'number' | 'scan';

export class TriggerTimeoutError extends AutomationError {
  constructor(
    readonly trigger: TriggerKind,
    readonly timeoutMs: number,
    description: string
  ) {
    super('TriggerTimeout', `${trigger} trigger timed out after ${timeoutMs}ms: ${description}`);
  }
}

export class NoMatchFoundError extends AutomationError {
  constructor(readonly scanId: string) {
    super('NoMatchFound', `scan '${scanId}' found no item`);
  }
}

export type ReferenceType = 'point' | 'scan' | 'slot' | 'item' | 'sequence';

export class MissingReferenceError extends AutomationError {
  constructor(
    readonly referenceType: ReferenceType,
    readonly reference: string | number,
    readonly owner: string
  ) {
    super('MissingReference', `${owner}: unknown ${referenceType} '${reference}'`);
  }
}

export class InjectionFailureError extends AutomationError {
  constructor(action: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('InjectionFailure', `${action} failed: ${reason}`, { cause });
  }
}

export type AbortReason = 'stop' | 'quit' | 'failsafe' | 'click-limit';

export class AbortRequestedError extends AutomationError {
  constructor(readonly reason: AbortReason) {
    super(
      reason === 'failsafe' ? 'FailSafeTriggered' : 'AbortRequested',
      reason === 'failsafe' ? 'pointer entered the fail-safe corner' : `abort requested (${reason})`
    );
  }
}

export function isAutomationError(error: unknown): error is AutomationError {
  return error instanceof AutomationError;
}

// ─── 表示用 ──────────────────────────────────────────

/**
 * エラー詳細をフォーマット（UI表示用）
 */
export function formatError(detail: ErrorDetail): string {
  const lines = [
    `❌ ${detail.kind}`,
    `  message: ${detail.message}`,
  ];

  if (detail.location) {
    lines.push(`  step:    ${detail.location.phase} #${detail.location.stepIndex + 1}`);
  }

  return lines.join('\n');
}

/**
 * エラーから自動復帰を試みるヒントを生成
 */
export function getSuggestion(detail: ErrorDetail): string {
  switch (detail.kind) {
    case 'TriggerTimeout':
      return '💡 Hint: raise the trigger timeout, check the color tolerance, or add an ELSE action to the step';
    case 'NoMatchFound':
      return '💡 Hint: no slot matched an item profile; verify marker colors and template confidence, or add an ELSE action';
    case 'MissingReference':
      return '💡 Hint: the workspace refers to a point or scan that does not exist';
    case 'InjectionFailure':
      return '💡 Hint: the input backend could not click or press a key; check that the target window is reachable';
    case 'FailSafeTriggered':
      return '💡 Hint: move the pointer out of the fail-safe corner before starting again';
    case 'AbortRequested':
      return '💡 Hint: the run was stopped on request';
  }
}
