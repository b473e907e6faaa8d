import env from "@/env";
import { getLogger } from "@/logger";
import type { ReadingSet } from "@/p1/Reading";
import { buildDevice, buildEntity, buildOrigin } from "@/payload/builder";
import { getStateTopic } from "@/payload/topic";
import type { LiveDataStore } from "@/service/liveData";
import initializeMqttClient from "@/service/mqtt";
import type { P1MeterClient } from "@/service/p1Meter";

const logger = getLogger("DeviceManager");

export default async function setupMqttDeviceManager(
  p1MeterClient: P1MeterClient,
  liveData: LiveDataStore,
) {
  const {
    device: { deviceId, entities, manufacturer, model },
  } = p1MeterClient;

  const origin = buildOrigin();
  const device = buildDevice(deviceId, manufacturer, model);

  const mqtt = await initializeMqttClient();

  entities.forEach((entity) => {
    // Home Assistantでデバイスを検出
    const discoveryMessage = {
      ...buildEntity(deviceId, entity),
      ...device,
      ...origin,
    };
    mqtt.publish(
      `${env.HA_DISCOVERY_PREFIX}/${entity.domain}/${discoveryMessage.unique_id}/config`,
      JSON.stringify(discoveryMessage),
      { qos: 1, retain: true },
    );
  });

  const publishStates = (readings: ReadingSet) => {
    entities.forEach((entity) => {
      const reading = readings[entity.code];
      if (!reading) {
        // 電文に含まれていないコード
        return;
      }
      mqtt.publish(getStateTopic(deviceId, entity), entity.converter(reading), {
        retain: true,
      });
    });
  };

  // 電文を受信するたびに最新値を保持し、一定間隔でエンティティの状態を送信
  const publishTask = (async () => {
    let lastPublishedAt: number | undefined;
    try {
      for await (const readings of p1MeterClient.readingSets()) {
        liveData.update(readings);

        const now = Date.now();
        if (
          lastPublishedAt !== undefined &&
          now - lastPublishedAt < env.STATE_PUBLISH_INTERVAL
        ) {
          logger.silly("Skip publishing states");
          continue;
        }
        lastPublishedAt = now;
        publishStates(readings);
        logger.debug("Entity states published");
      }
      logger.info("Telegram stream closed");
    } catch (err) {
      logger.error("Failed to read telegrams", err);
    }
  })();

  const stopPublishing = async () => {
    await p1MeterClient.close();
    await publishTask;
  };

  return { mqtt, stopPublishing };
}
