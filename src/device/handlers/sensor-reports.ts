import type { Logger } from "../../core/logger";
import { phrase } from "../../speech/phrases";
import type { TextToSpeech } from "../../speech/text-to-speech";
import type { CommandRegistry } from "../../types/device-action";
import type { HardwareCapability } from "../hardware/hardware-capability";

export const SENSOR_COMMANDS = {
  lightSensor: "com.example.commands.ReportLightSensor",
  humidity: "com.example.commands.ReportHumidity",
  altitude: "com.example.commands.ReportAltitude",
  temperature: "com.example.commands.ReportTemperature",
  pressure: "com.example.commands.ReportPressure",
} as const;

export const HUMIDITY_READ_ATTEMPTS = 20;
export const HUMIDITY_RETRY_INTERVAL_MS = 500;

export interface SensorReportOptions {
  hardware: HardwareCapability;
  speech: TextToSpeech;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

const format = (value: number): string => value.toFixed(2);

/**
 * Registers the sensor report commands. Each reads one value and speaks it.
 */
export function registerSensorReportHandlers(
  dispatcher: CommandRegistry,
  options: SensorReportOptions,
): void {
  const { hardware, speech, logger } = options;
  const sleep = options.sleep ?? defaultSleep;

  dispatcher.register(SENSOR_COMMANDS.lightSensor, async () => {
    const percent = await hardware.readLightLevel();
    logger.info("Reporting light sensor level", { percent: format(percent) });
    await speech.speak(phrase("lightSensor", { value: format(percent) }));
  });

  dispatcher.register(SENSOR_COMMANDS.humidity, async () => {
    for (let attempt = 0; attempt < HUMIDITY_READ_ATTEMPTS; attempt += 1) {
      const reading = await hardware.readHumidity();
      if (reading.valid) {
        logger.info("Reporting humidity", { percent: reading.value });
        await speech.speak(phrase("humidity", { value: reading.value }));
        return;
      }
      logger.info("Humidity reading not usable, retrying", { attempt });
      await sleep(HUMIDITY_RETRY_INTERVAL_MS);
    }
    logger.info("Reporting humidity: timeout");
    await speech.speak(phrase("humidityTimeout"));
  });

  dispatcher.register(SENSOR_COMMANDS.altitude, async () => {
    const altitude = await hardware.readAltitude();
    logger.info("Reporting altitude", { meters: format(altitude) });
    await speech.speak(phrase("altitude", { value: format(altitude) }));
  });

  dispatcher.register(SENSOR_COMMANDS.temperature, async () => {
    const temperature = await hardware.readTemperature();
    logger.info("Reporting room temperature", { celsius: format(temperature) });
    await speech.speak(phrase("temperature", { value: format(temperature) }));
  });

  dispatcher.register(SENSOR_COMMANDS.pressure, async () => {
    const hectopascals = (await hardware.readPressure()) / 100;
    logger.info("Reporting pressure", { hectopascals: format(hectopascals) });
    await speech.speak(phrase("pressure", { value: format(hectopascals) }));
  });
}
