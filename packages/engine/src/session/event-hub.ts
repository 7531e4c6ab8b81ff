import type { SessionEvent } from "../../../shared/src/contracts";

export type SessionEventListener = (event: SessionEvent) => void;

export class SessionEventHub {
  private readonly listeners = new Set<SessionEventListener>();

  subscribe(listener: SessionEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: SessionEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
