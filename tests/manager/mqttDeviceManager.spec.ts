import type { Entity } from "@/entity";
import env from "@/env";
import logger from "@/logger";
import setupMqttDeviceManager from "@/manager/mqttDeviceManager";
import type { ReadingSet } from "@/p1/Reading";
import { buildDevice, buildEntity, buildOrigin } from "@/payload/builder";
import { createLiveDataStore } from "@/service/liveData";
import type { MqttClient } from "@/service/mqtt";
import initializeMqttClient from "@/service/mqtt";
import type { P1MeterClient } from "@/service/p1Meter";
import type { Writable } from "type-fest";

const writableEnv: Writable<typeof env> = env;

vi.mock("@/payload/builder", () => ({
  buildEntity: vi.fn(),
  buildDevice: vi.fn(),
  buildOrigin: vi.fn(),
}));

vi.mock("@/service/mqtt", () => ({
  default: vi.fn(),
}));

const readings: ReadingSet = {
  "1-0:1.8.1": {
    code: "1-0:1.8.1",
    id: "consumedTariff1",
    name: "Rate 1",
    value: 1234.567,
    raw: "001234.567*kWh",
    unit: "kWh",
    precision: 3,
  },
};

function createEntity(id: string, code: string): Entity {
  return {
    id,
    name: `name of ${id}`,
    domain: "sensor",
    code,
    converter: vi.fn().mockReturnValue("999"),
  };
}

function createP1MeterClient(
  entities: Entity[],
  readingSets: () => AsyncGenerator<ReadingSet>,
): P1MeterClient {
  return {
    device: {
      deviceId: "deviceId",
      manufacturer: "manufacturer",
      model: "model",
      entities,
    },
    readingSets,
    close: vi.fn(),
  };
}

async function* toAsyncGenerator(readingSets: ReadingSet[]) {
  for (const readingSet of readingSets) {
    yield readingSet;
  }
}

describe("setupMqttDeviceManager", () => {
  const mockMqttClient: MqttClient = {
    publish: vi.fn(),
    taskQueueSize: 0,
    close: vi.fn(),
  };

  beforeEach(() => {
    vi.resetAllMocks();
    writableEnv.STATE_PUBLISH_INTERVAL = 0;

    vi.mocked(initializeMqttClient).mockResolvedValue(mockMqttClient);
    vi.mocked(buildOrigin).mockReturnValue({ origin: "test-origin" });
    vi.mocked(buildDevice).mockReturnValue({ device: "test-device" });
    vi.mocked(buildEntity).mockImplementation(
      (deviceId: string, entity: Entity) => ({
        unique_id: `p12mqtt_${deviceId}_${entity.id}`,
        name: entity.name,
      }),
    );
  });

  test("Home Assistantにデバイス情報が送信される", async () => {
    const client = createP1MeterClient(
      [createEntity("entity1", "1-0:1.8.1")],
      () => toAsyncGenerator([]),
    );

    const { stopPublishing } = await setupMqttDeviceManager(
      client,
      createLiveDataStore(),
    );
    await stopPublishing();

    expect(buildDevice).toHaveBeenCalledExactlyOnceWith(
      "deviceId",
      "manufacturer",
      "model",
    );
    expect(mockMqttClient.publish).toHaveBeenCalledExactlyOnceWith(
      `${env.HA_DISCOVERY_PREFIX}/sensor/p12mqtt_deviceId_entity1/config`,
      JSON.stringify({
        unique_id: "p12mqtt_deviceId_entity1",
        name: "name of entity1",
        device: "test-device",
        origin: "test-origin",
      }),
      { qos: 1, retain: true },
    );
  });

  test("電文に含まれるエンティティの状態が送信される", async () => {
    const entity = createEntity("entity1", "1-0:1.8.1");
    const client = createP1MeterClient([entity], () =>
      toAsyncGenerator([readings]),
    );

    const { stopPublishing } = await setupMqttDeviceManager(
      client,
      createLiveDataStore(),
    );
    await stopPublishing();

    expect(entity.converter).toHaveBeenCalledExactlyOnceWith(
      readings["1-0:1.8.1"],
    );
    expect(mockMqttClient.publish).toHaveBeenLastCalledWith(
      "p12mqtt/deviceId/entity1/state",
      "999",
      { retain: true },
    );
  });

  test("電文に含まれないエンティティは送信しない", async () => {
    const entity = createEntity("entity2", "1-0:2.8.1");
    const client = createP1MeterClient([entity], () =>
      toAsyncGenerator([readings]),
    );

    const { stopPublishing } = await setupMqttDeviceManager(
      client,
      createLiveDataStore(),
    );
    await stopPublishing();

    expect(entity.converter).not.toHaveBeenCalled();
    // 検出用のメッセージのみ
    expect(mockMqttClient.publish).toHaveBeenCalledTimes(1);
  });

  test("最新の電文を保持する", async () => {
    const liveData = createLiveDataStore();
    const client = createP1MeterClient(
      [createEntity("entity1", "1-0:1.8.1")],
      () => toAsyncGenerator([readings]),
    );

    const { stopPublishing } = await setupMqttDeviceManager(client, liveData);
    await stopPublishing();

    expect(liveData.readings).toBe(readings);
    expect(liveData.lastReceivedAt).toEqual(expect.any(Number));
  });

  test("送信間隔内に受信した電文の状態は送信しない", async () => {
    writableEnv.STATE_PUBLISH_INTERVAL = 60000;
    const entity = createEntity("entity1", "1-0:1.8.1");
    const client = createP1MeterClient([entity], () =>
      toAsyncGenerator([readings, readings, readings]),
    );

    const { stopPublishing } = await setupMqttDeviceManager(
      client,
      createLiveDataStore(),
    );
    await stopPublishing();

    expect(entity.converter).toHaveBeenCalledTimes(1);
  });

  test("stopPublishingでP1メーターのクライアントを閉じる", async () => {
    const client = createP1MeterClient([], () => toAsyncGenerator([]));

    const { stopPublishing } = await setupMqttDeviceManager(
      client,
      createLiveDataStore(),
    );
    await stopPublishing();

    expect(client.close).toHaveBeenCalledTimes(1);
  });

  test("電文の受信中にエラーが発生した場合ログに記録される", async () => {
    const logErrorSpy = vi.spyOn(logger, "error");
    const client = createP1MeterClient([], async function* () {
      throw new Error("test error");
    });

    const { stopPublishing } = await setupMqttDeviceManager(
      client,
      createLiveDataStore(),
    );
    await stopPublishing();

    expect(logErrorSpy).toHaveBeenCalledExactlyOnceWith(
      "Failed to read telegrams",
      expect.any(Error),
    );
  });
});
