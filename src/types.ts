export type NotificationKind = 'assert' | 'negate';

export type Notification = {
  kind: NotificationKind;
  cameraId: string;
  eventName: string;
  observedAt: number;
  synthetic?: boolean;
};

export type EventSessionState = 'active' | 'closed';

export type SessionEndReason = 'expired' | 'negated' | 'shutdown';

export interface EventSession {
  id: string;
  cameraId: string;
  eventName: string;
  startedAt: number;
  lastSeenAt: number;
  state: EventSessionState;
}

export type CaptureKind = 'video' | 'still';

export type CaptureStatus = 'succeeded' | 'failed' | 'timeout' | 'aborted' | 'skipped';

export interface CaptureResult {
  kind: CaptureKind;
  path: string;
  status: CaptureStatus;
  startedAt: number;
  finishedAt: number;
  exitCode: number | null;
  error: string | null;
}

export type HandlerStatus = 'succeeded' | 'failed' | 'timeout' | 'skipped';

export interface HandlerResult {
  status: HandlerStatus;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  error: string | null;
}

export type RecordingStatus = 'recording' | 'complete' | 'degraded';

export interface RecordingSession {
  id: string;
  cameraId: string;
  eventName: string;
  eventId: string;
  startedAt: number;
  deadline: number;
  paths: {
    video: string;
    still: string | null;
  };
  captures: CaptureResult[];
  handler: HandlerResult | null;
  status: RecordingStatus;
}

export type StreamAddresses = {
  main: string;
  minor: string | null;
  stills: string | null;
};

export type Logger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};
