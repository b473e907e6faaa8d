import { getLogger } from "@/logger";

const logger = getLogger("TelegramFramer");

/** 1電文の最大行数 (これを超えた電文は破棄する) */
export const MAX_TELEGRAM_LINES = 1024;

/**
 * 受信した行を `/` から `!` までの電文単位にまとめます。
 */
export class TelegramFramer {
  private lines: string[] | undefined;

  /** 電文の途中かどうか */
  get inTelegram(): boolean {
    return this.lines !== undefined;
  }

  /**
   * 1行を追加します。
   *
   * @param line 改行を含まない行
   * @returns 電文が完成した場合はその行の配列
   */
  push(line: string): string[] | undefined {
    if (line.startsWith("/")) {
      if (this.lines) {
        logger.warn(
          `Incomplete telegram discarded (${this.lines.length} lines)`,
        );
      }
      this.lines = [line];
      return undefined;
    }

    if (!this.lines) {
      // 電文の途中から受信した場合など
      logger.debug(`Skip line outside of telegram: ${line}`);
      return undefined;
    }

    this.lines.push(line);
    if (line.startsWith("!")) {
      const telegram = this.lines;
      this.lines = undefined;
      return telegram;
    }

    if (this.lines.length >= MAX_TELEGRAM_LINES) {
      logger.warn(`Telegram exceeded ${MAX_TELEGRAM_LINES} lines, discarded`);
      this.lines = undefined;
    }
    return undefined;
  }

  reset() {
    this.lines = undefined;
  }
}
