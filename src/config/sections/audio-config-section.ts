import { DEFAULT_ITER_SIZE, DEFAULT_VOLUME_PERCENTAGE } from "../../audio/conversation-stream";
import type { AudioConfig } from "../../types/configuration";
import type { LayeredConfigurationSource } from "../configuration-source";

export const DEFAULT_SAMPLE_RATE = 16000;
export const DEFAULT_CAPTURE_COMMAND = ["arecord", "-q", "-t", "raw", "-f", "S16_LE", "-c", "1", "-r", "{rate}"];
export const DEFAULT_PLAYBACK_COMMAND = ["aplay", "-q", "-t", "raw", "-f", "S16_LE", "-c", "1", "-r", "{rate}"];

export class AudioSection {
  read(source: LayeredConfigurationSource): AudioConfig {
    const c = source.getSection("audio");
    return {
      sampleRate: c.number("sampleRate", DEFAULT_SAMPLE_RATE),
      sampleWidth: 2,
      iterSize: c.number("iterSize", DEFAULT_ITER_SIZE),
      volumePercentage: c.number("volumePercentage", DEFAULT_VOLUME_PERCENTAGE),
      captureCommand: c.stringArray("captureCommand") ?? [...DEFAULT_CAPTURE_COMMAND],
      playbackCommand: c.stringArray("playbackCommand") ?? [...DEFAULT_PLAYBACK_COMMAND],
      inputFile: c.optionalString("inputFile"),
      outputFile: c.optionalString("outputFile"),
    };
  }
}
