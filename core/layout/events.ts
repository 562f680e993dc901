export type WallspanEventPhase = 'select' | 'plan' | 'scale' | 'fill' | 'composite' | 'origin' | 'run';
export type WallspanEventLevel = 'info' | 'warn' | 'error';

export interface WallspanEvent {
  phase: WallspanEventPhase;
  level: WallspanEventLevel;
  code: string;
  message: string;
  metrics?: Record<string, string | number>;
}

export type WallspanEventCallback = (event: WallspanEvent) => void;

export interface EventCapableOptions {
  onEvent?: WallspanEventCallback;
}

export function emit(onEvent: WallspanEventCallback | undefined, event: WallspanEvent) {
  onEvent?.(event);
}
