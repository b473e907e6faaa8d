import logger from "@/logger";
import { setupAvailability } from "@/manager/availabilityManager";
import setupMqttDeviceManager from "@/manager/mqttDeviceManager";
import initializeHttpServer from "@/service/http";
import { createLiveDataStore } from "@/service/liveData";
import initializeP1MeterClient from "@/service/p1Meter";

async function main() {
  logger.info("start");

  const p1MeterClient = await initializeP1MeterClient();
  const liveData = createLiveDataStore();
  const { mqtt, stopPublishing } = await setupMqttDeviceManager(
    p1MeterClient,
    liveData,
  );
  const http = await initializeHttpServer(liveData);
  const availability = setupAvailability(
    p1MeterClient.device.deviceId,
    mqtt,
    liveData,
  );

  const handleShutdown = async () => {
    logger.info("shutdown start");
    await stopPublishing();
    availability.close();
    await mqtt.close(true);
    await http.close();
    logger.info("shutdown finished");
    process.exit(0);
  };

  process.on("SIGINT", () => void handleShutdown());
  process.on("SIGTERM", () => void handleShutdown());

  availability.pushOnline();

  logger.info("ready");
}

try {
  await main();
} catch (err) {
  logger.error("main() error:", err);
  process.exit(1);
}
