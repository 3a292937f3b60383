import type { AssistantServiceConfig } from "../../types/configuration";
import type { LayeredConfigurationSource } from "../configuration-source";

export const DEFAULT_ENDPOINT = "ws://127.0.0.1:9090/v1/assist";
export const DEFAULT_LANGUAGE_CODE = "en-US";
export const DEFAULT_DEADLINE_SECONDS = 185;

export class AssistantSection {
  read(source: LayeredConfigurationSource): AssistantServiceConfig {
    const c = source.getSection("assistant");
    return {
      endpoint: c.string("endpoint", DEFAULT_ENDPOINT),
      languageCode: c.string("languageCode", DEFAULT_LANGUAGE_CODE),
      deadlineSeconds: c.number("deadlineSeconds", DEFAULT_DEADLINE_SECONDS),
      displayEnabled: c.boolean("displayEnabled", false),
      credentialsPath: c.optionalString("credentialsPath"),
      accessToken: c.optionalString("accessToken"),
    };
  }
}
