import { isLogLevel } from "../../core/logger";
import type { LoggingConfig } from "../../types/configuration";
import type { LayeredConfigurationSource } from "../configuration-source";

export class LoggingSection {
  read(source: LayeredConfigurationSource): LoggingConfig {
    const level = source.getSection("logging").string("level", "info");
    return { level: isLogLevel(level) ? level : "info" };
  }
}
