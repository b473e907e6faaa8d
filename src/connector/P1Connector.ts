import { getLogger } from "@/logger";
import { TelegramFramer } from "@/p1/TelegramFramer";
import { autoDetect } from "@serialport/bindings-cpp";
import type { BindingInterface } from "@serialport/bindings-interface";
import { ReadlineParser } from "@serialport/parser-readline";
import { SerialPortStream } from "@serialport/stream";
import { pEventIterator } from "p-event";
import { Emitter } from "strict-event-emitter";

const logger = getLogger("P1Connector");

export type SerialSettings = {
  baudRate: number;
  dataBits: 7 | 8;
  parity: "none" | "even" | "odd";
  /** XON/XOFFによるフロー制御 */
  xonxoff: boolean;
};

type Events = {
  telegram: [lines: string[]]; // `/` から `!` までの1電文
  error: [err: Error]; // エラーイベント
  close: []; // シリアルポートのクローズ
};

export class P1Connector extends Emitter<Events> {
  private serialPort: SerialPortStream;
  private parser: ReadlineParser;
  private framer = new TelegramFramer();

  /**
   * P1Connector クラスのインスタンスを初期化し、シリアルポートを開きます。
   *
   * @param devicePath シリアルポートのパス
   * @param settings 通信設定
   * @param binding シリアルポートのバインディング (テスト時にモックを指定)
   */
  constructor(
    devicePath: string,
    settings: SerialSettings,
    binding: BindingInterface = autoDetect(),
  ) {
    super();

    this.serialPort = new SerialPortStream({
      binding,
      path: devicePath,
      baudRate: settings.baudRate,
      dataBits: settings.dataBits,
      parity: settings.parity,
      xon: settings.xonxoff,
      xoff: settings.xonxoff,
    });
    // CRLFのCRは行ごとに取り除く
    this.parser = this.serialPort.pipe(
      new ReadlineParser({ delimiter: "\n", encoding: "latin1" }),
    );
    this.setupSerialEventHandlers();
  }

  private setupSerialEventHandlers() {
    // シリアルポートからの行受信
    this.parser.on("data", (data: string) => {
      const telegram = this.framer.push(data.replace(/\r$/, ""));
      if (!telegram) {
        return;
      }

      /* v8 ignore if -- @preserve */
      if (logger.isDebugEnabled()) {
        logger.debug(`Received telegram:\n${telegram.join("\n")}`);
      }
      this.emit("telegram", telegram);
    });

    // シリアルポートのエラーハンドリング
    this.serialPort.on("error", (err: Error) => {
      logger.error("An error occurred in the SerialPort:", err);
      this.emit("error", err);
    });

    this.serialPort.on("close", () => {
      this.framer.reset();
      this.emit("close");
    });
  }

  /**
   * 受信した電文を1つずつ返すイテレータを取得します。
   * シリアルポートが閉じられると終了し、エラーが発生すると例外をスローします。
   */
  telegrams(): AsyncIterableIterator<string[]> {
    return pEventIterator<"telegram", string[]>(this, "telegram", {
      resolutionEvents: ["close"],
    });
  }

  /**
   * シリアルポートを閉じ、リソースを解放します。
   * 既に閉じている場合は何もしません。
   */
  close(): Promise<void> {
    if (!this.serialPort.isOpen) {
      logger.debug("Serial port is not open");
      this.emit("close");
      return Promise.resolve();
    }

    logger.info("Closing serial port...");
    return new Promise<void>((resolve) => {
      this.serialPort.close((err) => {
        if (err) {
          logger.error("Failed to close serial port:", err);
        } else {
          logger.info("Serial port successfully closed");
        }
        resolve();
      });
    });
  }
}

/**
 * 実際のシリアルポートに接続するP1Connectorを作成します。
 */
export function createP1Connector(
  devicePath: string,
  settings: SerialSettings,
): P1Connector {
  logger.info(
    `Opening ${devicePath} (${settings.baudRate} baud, ${settings.dataBits}${settings.parity[0].toUpperCase()}1)`,
  );
  return new P1Connector(devicePath, settings);
}
