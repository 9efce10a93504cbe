export interface IOrderedKeyedMapLogger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ILoggerContext {
  orderType?: string;
  key?: string;
  size?: number;
}

export class LogWriter {
  constructor(public logger: IOrderedKeyedMapLogger) {}

  public log(message: string, context?: ILoggerContext) {
    const messageToWrite = this.computeMessageToWrite(message, context);
    this.logger.log(messageToWrite);
  }

  public error(message: string, context?: ILoggerContext) {
    const messageToWrite = this.computeMessageToWrite(message, context);
    this.logger.error(messageToWrite);
  }

  public warn(message: string, context?: ILoggerContext) {
    const messageToWrite = this.computeMessageToWrite(message, context);
    this.logger.warn(messageToWrite);
  }

  private computeMessageToWrite(message: string, context?: ILoggerContext) {
    const contextMessages: string[] = [];
    if (context) {
      for (const key of Object.keys(context) as (keyof ILoggerContext)[]) {
        const value = context[key];
        // a size of 0 is still worth reporting
        if (value === undefined) {
          continue;
        }
        contextMessages.push(`${key}: ${value}`);
      }
    }
    if (!contextMessages.length) {
      return message;
    }
    return `${message}. ${contextMessages.join(", ")}`;
  }
}
