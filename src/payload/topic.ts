import type { Entity } from "@/entity";

const TOPIC_PREFIX = "p12mqtt";

export function getStateTopic(deviceId: string, entity: Entity): string {
  return `${TOPIC_PREFIX}/${deviceId}/${entity.id}/state`;
}

/** デバイス単位のオンライン状態 */
export function getAvailabilityTopic(deviceId: string): string {
  return `${TOPIC_PREFIX}/${deviceId}/availability`;
}
