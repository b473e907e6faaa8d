import env from "@/env";
import { getAvailabilityTopic } from "@/payload/topic";
import type { LiveDataStore } from "@/service/liveData";
import type { MqttClient } from "@/service/mqtt";

export function setupAvailability(
  deviceId: string,
  mqtt: MqttClient,
  liveData: LiveDataStore,
) {
  const topic = getAvailabilityTopic(deviceId);
  const pushAvailability = (value: "online" | "offline") => {
    mqtt.publish(topic, value, { retain: true });
  };

  const pushOnline = () => pushAvailability("online");

  // 電文が途絶えていればオフラインとして定期的に送信
  const availabilityTimerId = setInterval(() => {
    pushAvailability(
      liveData.isStale(env.P1_STALE_TIMEOUT) ? "offline" : "online",
    );
  }, env.AVAILABILITY_INTERVAL);

  const close = () => {
    clearInterval(availabilityTimerId);
    pushAvailability("offline");
  };

  return {
    pushOnline,
    close,
  };
}
