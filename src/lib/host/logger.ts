import { DeobfEventEmitter } from '../events/emitter'
import { HostLogger, LogLevel } from '../types'

/**
 * Host logger sink that forwards every line to the event emitter as a `host_log` event.
 */
export class EventHostLogger implements HostLogger {
  constructor(
    private readonly projectName: string,
    private readonly emitter: DeobfEventEmitter
  ) {}

  error(message: string): void {
    this.log('error', message)
  }

  warn(message: string): void {
    this.log('warn', message)
  }

  info(message: string): void {
    this.log('info', message)
  }

  debug(message: string): void {
    this.log('debug', message)
  }

  private log(level: LogLevel, message: string): void {
    this.emitter.emitEvent({
      type: 'host_log',
      level,
      data: {
        projectName: this.projectName,
        message
      }
    })
  }
}
