export type SwapErrorKind =
  | 'NoAudioSource'
  | 'NoInputAudio'
  | 'ProbeFailure'
  | 'UnsupportedContainer'
  | 'AmbiguousSelection'
  | 'ExternalEngineFailure'
  | 'InvalidArguments'
  | 'NoVideoInput'
  | 'OutputExists'
  | 'Interrupted';

export type InterruptSignal = 'SIGINT' | 'SIGTERM';

export function isInterruptSignal(value: unknown): value is InterruptSignal {
  return value === 'SIGINT' || value === 'SIGTERM';
}

export class SwapError extends Error {
  constructor(
    public readonly kind: SwapErrorKind,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'SwapError';
  }
}

export function isSwapError(err: unknown, kind?: SwapErrorKind): err is SwapError {
  return err instanceof SwapError && (kind === undefined || err.kind === kind);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
