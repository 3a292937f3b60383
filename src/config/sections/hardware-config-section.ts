import type { HardwareConfig } from "../../types/configuration";
import type { LayeredConfigurationSource } from "../configuration-source";

export const STANDARD_SEA_LEVEL_PRESSURE_PA = 101_325;
export const DEFAULT_LIGHT_SENSOR_MAX_RAW = 255;

export class HardwareSection {
  read(source: LayeredConfigurationSource): HardwareConfig {
    const c = source.getSection("hardware");
    return {
      enabled: c.boolean("enabled", false),
      lightSensorPath: c.optionalString("lightSensorPath"),
      lightSensorMaxRaw: c.number("lightSensorMaxRaw", DEFAULT_LIGHT_SENSOR_MAX_RAW),
      humidityPath: c.optionalString("humidityPath"),
      temperaturePath: c.optionalString("temperaturePath"),
      pressurePath: c.optionalString("pressurePath"),
      indicatorPath: c.optionalString("indicatorPath"),
      seaLevelPressurePa: c.number("seaLevelPressurePa", STANDARD_SEA_LEVEL_PRESSURE_PA),
    };
  }
}
