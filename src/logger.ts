import env from "@/env";
import { createLogger, format, transports } from "winston";

const logger = createLogger({
  level: env.LOG_LEVEL,
  format: format.combine(
    format.errors({ stack: true }),
    format.colorize(),
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    format.printf(({ timestamp, level, message, stack, module }) => {
      const prefix = typeof module === "string" ? `[${module}] ` : "";
      let log = `[${timestamp as string}] [${level}]: ${prefix}${message as string}`;
      if (typeof stack === "string") {
        log = `${log}\n${stack}`;
      }
      return log;
    }),
  ),
  transports: [
    new transports.Console({
      stderrLevels: ["warn", "error"],
    }),
  ],
});

/**
 * メッセージの先頭にモジュール名を付与するロガーを取得します。
 *
 * @param module モジュール名
 */
export function getLogger(module: string) {
  return logger.child({ module });
}

export default logger;
