import { bool, cleanEnv, num, port, str, testOnly } from "envalid";

const env = cleanEnv(process.env, {
  MQTT_BROKER: str({
    desc: "MQTTブローカー",
    example: "mqtt://localhost",
    devDefault: testOnly("mqtt://mqtt-broker"),
  }),
  MQTT_USERNAME: str({
    desc: "MQTTユーザ名",
    default: undefined,
    devDefault: testOnly("test-user"),
  }),
  MQTT_PASSWORD: str({
    desc: "MQTTパスワード",
    default: undefined,
    devDefault: testOnly("test-password"),
  }),
  MQTT_TASK_INTERVAL: num({
    desc: "MQTTタスク実行間隔",
    default: 10,
    devDefault: testOnly(1),
  }),
  ENTITY_QOS: num({
    desc: "エンティティのQOS設定",
    choices: [0, 1, 2],
    default: 1,
  }),
  LOG_LEVEL: str({ default: "info", desc: "ログ出力 (debugで電文を出力)" }),
  HA_DISCOVERY_PREFIX: str({
    desc: "https://www.home-assistant.io/integrations/mqtt/#discovery-options",
    default: "homeassistant",
  }),
  PORT: port({
    desc: "ヘルスチェック・ライブデータ用HTTPサーバーのポート",
    default: 3000,
    devDefault: testOnly(0),
  }),
  AVAILABILITY_INTERVAL: num({
    desc: "オンライン状態を送信する間隔",
    default: 10000,
  }),
  STATE_PUBLISH_INTERVAL: num({
    desc: "エンティティの状態を送信する最小間隔",
    default: 10000,
    devDefault: testOnly(0),
  }),
  P1_DEVICE_PATH: str({
    desc: "P1ポートに接続したシリアルデバイスのパス",
    default: "/dev/ttyUSB0",
    example: "/dev/ttyUSB0 or COM3",
  }),
  P1_BAUDRATE: num({
    desc: "ボーレート (DSMR 4以降:115200, DSMR 2.2:9600)",
    choices: [9600, 115200],
    default: 115200,
  }),
  P1_DATA_BITS: num({
    desc: "データビット",
    choices: [7, 8],
    default: 8,
  }),
  P1_PARITY: str({
    desc: "パリティ",
    choices: ["none", "even", "odd"],
    default: "none",
  }),
  P1_XONXOFF: bool({ desc: "XON/XOFFフロー制御", default: true }),
  P1_VERIFY_CHECKSUM: bool({
    desc: "電文のCRC16チェックサムを検証する",
    default: true,
  }),
  P1_TELEGRAM_TIMEOUT: num({
    desc: "起動時に最初の電文を待つ時間",
    default: 30000,
  }),
  P1_STALE_TIMEOUT: num({
    desc: "電文が途絶えてからオフラインとみなすまでの時間",
    default: 60000,
  }),
  OBIS_DEFINITIONS_PATH: str({
    desc: "OBISコード定義を追加・上書きするJSONファイルのパス",
    default: undefined,
    example: "./obis-definitions.json",
  }),
});

export default env;
