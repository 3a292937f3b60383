import { parseArgs } from "util";
import type { ConfigurationLayer } from "./config/configuration-source";

export const HELP = `
Usage: assistant-turn [options]

Streams one request per trigger to the assistant service and plays the reply.
Press Enter to start a turn; follow-on turns start by themselves.

Options:
  --config <file>              JSON configuration file
  --endpoint <url>             Assistant WebSocket endpoint (ws:// or wss://)
  --credentials <file>         JSON file holding an access token
  --access-token <token>       Access token (overrides --credentials)
  --device-model-id <id>       Registered device model id
  --device-id <id>             Registered device instance id
  --device-config <file>       Device config file with "id" and "model_id"
  --lang <code>                Language code of the conversation (default en-US)
  --display                    Request screen output and save it as HTML
  --verbose                    Log every request and response
  --input-audio-file <file>    Raw 16-bit PCM to send instead of the microphone
  --output-audio-file <file>   Raw 16-bit PCM file to write instead of playing
  --audio-sample-rate <hz>     Sample rate of input and output audio
  --audio-sample-width <bytes> Bytes per sample (only 2 is supported)
  --audio-iter-size <bytes>    Bytes read from the microphone per request
  --deadline <seconds>         Deadline of one assist call
  --once                       Stop after the first conversation
  --help                       Show this help
`;

export interface CliOptions {
  configFile?: string;
  verbose: boolean;
  once: boolean;
  help: boolean;
  overrides: ConfigurationLayer;
}

/**
 * Numbers that do not parse stay strings so configuration validation names them.
 */
function numeric(value: string | undefined): number | string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return value.trim() !== "" && Number.isFinite(parsed) ? parsed : value;
}

export function parseCliOptions(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    allowPositionals: false,
    strict: true,
    options: {
      config: { type: "string" },
      endpoint: { type: "string" },
      credentials: { type: "string" },
      "access-token": { type: "string" },
      "device-model-id": { type: "string" },
      "device-id": { type: "string" },
      "device-config": { type: "string" },
      lang: { type: "string" },
      display: { type: "boolean" },
      verbose: { type: "boolean", short: "v" },
      "input-audio-file": { type: "string", short: "i" },
      "output-audio-file": { type: "string", short: "o" },
      "audio-sample-rate": { type: "string" },
      "audio-sample-width": { type: "string" },
      "audio-iter-size": { type: "string" },
      deadline: { type: "string" },
      once: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });

  const overrides: ConfigurationLayer = {
    assistant: {
      endpoint: values.endpoint,
      languageCode: values.lang,
      deadlineSeconds: numeric(values.deadline),
      displayEnabled: values.display,
      credentialsPath: values.credentials,
      accessToken: values["access-token"],
    },
    device: {
      id: values["device-id"],
      modelId: values["device-model-id"],
      configPath: values["device-config"],
    },
    audio: {
      sampleRate: numeric(values["audio-sample-rate"]),
      sampleWidth: numeric(values["audio-sample-width"]),
      iterSize: numeric(values["audio-iter-size"]),
      inputFile: values["input-audio-file"],
      outputFile: values["output-audio-file"],
    },
    logging: {
      level: values.verbose ? "debug" : undefined,
    },
  };

  return {
    configFile: values.config,
    verbose: values.verbose ?? false,
    once: values.once ?? false,
    help: values.help ?? false,
    overrides: pruneUndefined(overrides),
  };
}

function pruneUndefined(layer: ConfigurationLayer): ConfigurationLayer {
  const result: ConfigurationLayer = {};
  for (const [section, values] of Object.entries(layer)) {
    const kept = Object.entries(values).filter(([, value]) => value !== undefined);
    if (kept.length > 0) {
      result[section] = Object.fromEntries(kept);
    }
  }
  return result;
}
