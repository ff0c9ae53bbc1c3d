import { EventEmitter } from 'events'
import { DeobfEvent, DeobfEventInput } from '../types/events'

/**
 * Type-safe event emitter for deobfuscation events.
 * Extends Node.js EventEmitter with typed event methods.
 */
export class DeobfEventEmitter extends EventEmitter {
  /**
   * Emits an event with automatic timestamp injection.
   */
  public emitEvent(event: DeobfEventInput): void {
    const fullEvent = {
      ...event,
      timestamp: new Date()
    }

    // Emit on both the specific event type and a general 'event' channel
    this.emit(event.type, fullEvent)
    this.emit('event', fullEvent)
  }

  /**
   * Type-safe event listener registration.
   */
  public onEvent<T extends DeobfEvent['type']>(
    eventType: T,
    listener: (event: Extract<DeobfEvent, { type: T }>) => void
  ): this {
    return this.on(eventType, listener)
  }

  /**
   * Listen to all events.
   */
  public onAnyEvent(listener: (event: DeobfEvent) => void): this {
    return this.on('event', listener)
  }

  /**
   * Remove a listener registered with `onAnyEvent`.
   */
  public offAnyEvent(listener: (event: DeobfEvent) => void): this {
    return this.off('event', listener)
  }

  /**
   * One-time event listener.
   */
  public onceEvent<T extends DeobfEvent['type']>(
    eventType: T,
    listener: (event: Extract<DeobfEvent, { type: T }>) => void
  ): this {
    return this.once(eventType, listener)
  }

  /**
   * Remove event listener.
   */
  public offEvent<T extends DeobfEvent['type']>(
    eventType: T,
    listener: (event: Extract<DeobfEvent, { type: T }>) => void
  ): this {
    return this.off(eventType, listener)
  }
}

// Singleton instance used by the CLI
export const deobfEvents = new DeobfEventEmitter()
