export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogContext {
  [key: string]: unknown
}

export interface LogEvent {
  level: LogLevel
  namespace: string
  message: string
  context?: LogContext
  error?: Error
  createdAt: string
}

export interface LoggerSink {
  emit(event: LogEvent): void
}

export class InMemorySink implements LoggerSink {
  private events: LogEvent[] = []

  emit(event: LogEvent): void {
    this.events.push(event)
  }

  read(): readonly LogEvent[] {
    return this.events
  }

  clear(): void {
    this.events = []
  }
}

export class ConsoleSink implements LoggerSink {
  emit(event: LogEvent): void {
    const line = `[${event.namespace}] ${event.message}`
    const extras: unknown[] = []
    if (event.context) extras.push(event.context)
    if (event.error) extras.push(event.error)

    switch (event.level) {
      case 'debug':
        console.debug(line, ...extras)
        break
      case 'info':
        console.info(line, ...extras)
        break
      case 'warn':
        console.warn(line, ...extras)
        break
      case 'error':
        console.error(line, ...extras)
        break
    }
  }
}

const sharedSinks: LoggerSink[] = [new ConsoleSink()]

export class Logger {
  private readonly namespace: string
  private sinks: LoggerSink[]

  constructor(namespace = 'dashboard', sinks: LoggerSink[] = sharedSinks) {
    this.namespace = namespace
    this.sinks = sinks
  }

  withSink(sink: LoggerSink): this {
    this.sinks = [...this.sinks, sink]
    return this
  }

  /** Adds a sink seen by this logger and every child sharing its sinks. Returns the detach function. */
  attach(sink: LoggerSink): () => void {
    this.sinks.push(sink)
    return () => {
      const index = this.sinks.indexOf(sink)
      if (index !== -1) this.sinks.splice(index, 1)
    }
  }

  child(namespace: string): Logger {
    return new Logger(`${this.namespace}:${namespace}`, this.sinks)
  }

  debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context)
  }

  info(message: string, context?: LogContext): void {
    this.emit('info', message, context)
  }

  warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context)
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.emit('error', message, context, error)
  }

  private emit(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    const event: LogEvent = {
      level,
      namespace: this.namespace,
      message,
      context,
      error,
      createdAt: new Date().toISOString(),
    }
    for (const sink of this.sinks) sink.emit(event)
  }
}

export const logger = new Logger()
