import env from "@/env";
import { getLogger } from "@/logger";
import { randomBytes } from "crypto";
import mqttjs from "mqtt";
import { setTimeout } from "timers/promises";
import { name as packageName } from "~/package.json";

const logger = getLogger("MQTT");

export type PublishOptions = { retain?: boolean; qos?: 0 | 1 | 2 };

export type MqttClient = {
  taskQueueSize: number;
  publish: (topic: string, message: string, options?: PublishOptions) => void;
  close: (wait?: boolean) => Promise<void>;
};

export default async function initializeMqttClient(): Promise<MqttClient> {
  const client = await mqttjs.connectAsync(env.MQTT_BROKER, {
    clientId: `${packageName}_${randomBytes(4).toString("hex")}`,
    username: env.MQTT_USERNAME,
    password: env.MQTT_PASSWORD,
  });
  client.on("error", (err) => logger.error("client error:", err));
  // 未送信のメッセージ (同じトピックは最新のメッセージで置き換える)
  const pendingMessages = new Map<
    string,
    { message: string; options?: PublishOptions }
  >();

  logger.info("connected");

  let isMqttTaskRunning = true;
  const mqttTask = (async () => {
    while (isMqttTaskRunning) {
      logger.silly(`pending messages: ${pendingMessages.size}`);
      const next = pendingMessages.entries().next();
      if (!next.done) {
        const [topic, { message, options }] = next.value;
        pendingMessages.delete(topic);
        try {
          await client.publishAsync(topic, message, options);
        } catch (err) {
          logger.error(`Failed to publish to ${topic}:`, err);
        }
      }
      await setTimeout(env.MQTT_TASK_INTERVAL);
    }
  })();

  const close = async (wait: boolean = false): Promise<void> => {
    if (wait) {
      logger.info("waiting for pending messages to be sent...");
      while (pendingMessages.size > 0) {
        await setTimeout(env.MQTT_TASK_INTERVAL);
      }
      logger.info("all messages sent");
    }

    isMqttTaskRunning = false;
    await mqttTask;
    logger.info("task stopped");
    await client.endAsync();
    logger.info("closed");
  };

  const publish = (
    topic: string,
    message: string,
    options?: PublishOptions,
  ): void => {
    pendingMessages.set(topic, { message, options });
  };

  return {
    get taskQueueSize() {
      return pendingMessages.size;
    },
    publish,
    close,
  };
}
