import pino from 'pino'
import type { Logger, LoggerContext } from '../../application/ports/logger.js'
import type { LogConfig } from '../../composition/config.js'

type LogLevel = 'info' | 'error' | 'warn' | 'debug'

export function createPinoInstance(config: LogConfig, name: string): pino.Logger {
  return pino({
    name,
    level: config.level,
    transport: config.pretty ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname'
      }
    } : undefined
  })
}

export class PinoLogger implements Logger {
  constructor(private readonly pinoInstance: pino.Logger) {}

  info(message: string, obj?: object): void {
    this.write('info', message, obj)
  }

  error(message: string, obj?: object): void {
    this.write('error', message, obj)
  }

  warn(message: string, obj?: object): void {
    this.write('warn', message, obj)
  }

  debug(message: string, obj?: object): void {
    this.write('debug', message, obj)
  }

  child(context: LoggerContext): Logger {
    return new PinoLogger(this.pinoInstance.child(context))
  }

  private write(level: LogLevel, message: string, obj?: object): void {
    if (obj) {
      this.pinoInstance[level](obj, message)
    } else {
      this.pinoInstance[level](message)
    }
  }
}
