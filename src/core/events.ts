import { EventEmitter } from 'eventemitter3';
import type { PysmithEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof PysmithEvents>(event: K, listener: (data: PysmithEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  emit<K extends keyof PysmithEvents>(event: K, data: PysmithEvents[K]): void {
    this.emitter.emit(event, data);
  }
}
