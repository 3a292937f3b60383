import { readFile, writeFile } from "fs/promises";
import type { Logger } from "../../core/logger";
import type { HardwareConfig } from "../../types/configuration";

export interface SensorReading {
  value: number;
  /** False when the sensor answered with a value it flags as unreliable. */
  valid: boolean;
}

/**
 * Access to the optional sensor board and indicator LED.
 *
 * @remarks
 * Chosen once at startup by {@link createHardwareCapability} and injected into
 * the handlers that need it.
 */
export interface HardwareCapability {
  readonly available: boolean;
  setIndicator(on: boolean): Promise<void>;
  /** Relative brightness, 0-100. */
  readLightLevel(): Promise<number>;
  readHumidity(): Promise<SensorReading>;
  /** Degrees Celsius. */
  readTemperature(): Promise<number>;
  /** Pascals. */
  readPressure(): Promise<number>;
  /** Metres above sea level, derived from pressure. */
  readAltitude(): Promise<number>;
}

export class NoOpHardwareCapability implements HardwareCapability {
  readonly available = false;

  async setIndicator(): Promise<void> {
    return;
  }

  async readLightLevel(): Promise<number> {
    return 0;
  }

  async readHumidity(): Promise<SensorReading> {
    return { value: 0, valid: true };
  }

  async readTemperature(): Promise<number> {
    return 0;
  }

  async readPressure(): Promise<number> {
    return 0;
  }

  async readAltitude(): Promise<number> {
    return 0;
  }
}

/**
 * International barometric formula.
 */
export function pressureToAltitude(pressurePa: number, seaLevelPa: number): number {
  if (pressurePa <= 0) {
    return 0;
  }
  return 44330 * (1 - Math.pow(pressurePa / seaLevelPa, 1 / 5.255));
}

/**
 * Reads sensors exposed as text files (sysfs/IIO style) holding one number each.
 */
export class HardwareBackedCapability implements HardwareCapability {
  readonly available = true;

  constructor(
    private readonly config: HardwareConfig,
    private readonly logger: Logger,
  ) {}

  async setIndicator(on: boolean): Promise<void> {
    if (!this.config.indicatorPath) {
      return;
    }
    await writeFile(this.config.indicatorPath, on ? "1" : "0");
  }

  async readLightLevel(): Promise<number> {
    const raw = await this.readNumber(this.config.lightSensorPath, "light sensor");
    const max = this.config.lightSensorMaxRaw > 0 ? this.config.lightSensorMaxRaw : 1;
    return Math.round(Math.min(Math.max(raw / max, 0), 1) * 100);
  }

  async readHumidity(): Promise<SensorReading> {
    const value = await this.readNumber(this.config.humidityPath, "humidity sensor");
    return { value, valid: Number.isFinite(value) && value >= 0 && value <= 100 };
  }

  async readTemperature(): Promise<number> {
    return this.readNumber(this.config.temperaturePath, "temperature sensor");
  }

  async readPressure(): Promise<number> {
    return this.readNumber(this.config.pressurePath, "pressure sensor");
  }

  async readAltitude(): Promise<number> {
    const pressure = await this.readPressure();
    return pressureToAltitude(pressure, this.config.seaLevelPressurePa);
  }

  private async readNumber(path: string | undefined, label: string): Promise<number> {
    if (!path) {
      this.logger.warn("Sensor not configured", { sensor: label });
      return 0;
    }
    const text = await readFile(path, "utf8");
    const value = Number.parseFloat(text.trim());
    if (Number.isNaN(value)) {
      throw new Error(`Unreadable ${label} value at ${path}`);
    }
    return value;
  }
}

export function createHardwareCapability(
  config: HardwareConfig,
  logger: Logger,
): HardwareCapability {
  if (!config.enabled) {
    logger.debug("Hardware capability disabled; using no-op sensors");
    return new NoOpHardwareCapability();
  }
  return new HardwareBackedCapability(config, logger);
}
