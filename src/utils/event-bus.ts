import { EventEmitter } from 'node:events';

export interface OnboardingEvent {
  type: string;
  source: string;
  timestamp: string;
  data: Record<string, unknown>;
}

export type EventHandler = (event: OnboardingEvent) => void;

export class EventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  publish(event: OnboardingEvent): void {
    this.emitter.emit(event.type, event);
    this.emitter.emit('*', event);
  }

  subscribe(eventType: string, handler: EventHandler): () => void {
    this.emitter.on(eventType, handler);
    return () => this.emitter.off(eventType, handler);
  }
}

export const eventBus = new EventBus();
