export type RuntimeEventType =
  | "entity.created"
  | "entity.removed"
  | "entity.renamed"
  | "document.loaded"
  | "document.committed"
  | "document.rolledBack";

export interface RuntimeEvent {
  seq: number;
  type: RuntimeEventType;
  payload: Record<string, unknown>;
}

export interface RuntimeEventLog {
  next(type: RuntimeEventType, payload: Record<string, unknown>): RuntimeEvent;
}

export function createRuntimeEventLog(startAt = 0): RuntimeEventLog {
  let seq = startAt;
  return {
    next(type, payload) {
      seq += 1;
      return {
        seq,
        type,
        payload,
      };
    },
  };
}
