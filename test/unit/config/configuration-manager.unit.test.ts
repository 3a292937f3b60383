import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { ConfigurationManager, type ConfigurationManagerOptions } from "../../../src/config/configuration-manager";
import { DEFAULT_ENDPOINT } from "../../../src/config/sections/assistant-config-section";
import { ConfigurationError } from "../../../src/core/errors";
import { DEFAULT_TURN_RETRY_ENVELOPE } from "../../../src/core/retry/retry-envelopes";
import { expect } from "../../helpers/chai-setup";
import { createTestContext, type TestContext } from "../../helpers/fakes";
import { setup, suite, teardown, test } from "../../mocha-globals";

async function rejection(manager: ConfigurationManager): Promise<ConfigurationError> {
  try {
    await manager.initialize();
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected initialize to fail");
}

suite("Unit: ConfigurationManager", () => {
  let directory: string;
  let ctx: TestContext;

  const manager = (options: ConfigurationManagerOptions = {}) =>
    new ConfigurationManager(ctx.logger, { env: {}, ...options });

  setup(async () => {
    directory = await mkdtemp(join(tmpdir(), "config-test-"));
    ctx = createTestContext();
  });

  teardown(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  test("falls back to defaults when no layer sets a value", async () => {
    const config = manager();
    await config.initialize();

    expect(config.isInitialized()).to.equal(true);
    expect(config.getAssistantConfig()).to.deep.equal({
      endpoint: DEFAULT_ENDPOINT,
      languageCode: "en-US",
      deadlineSeconds: 185,
      displayEnabled: false,
      credentialsPath: undefined,
      accessToken: undefined,
    });
    expect(config.getRetryConfig()).to.deep.equal(DEFAULT_TURN_RETRY_ENVELOPE);
    expect(config.getAudioConfig()).to.include({ sampleRate: 16000, sampleWidth: 2, iterSize: 3200, volumePercentage: 50 });
    expect(config.getLoggingConfig()).to.deep.equal({ level: "info" });
    expect(config.getDiagnostics()?.warnings).to.deep.equal([]);
  });

  test("command line beats environment, which beats the config file", async () => {
    const file = join(directory, "client.json");
    await writeFile(
      file,
      JSON.stringify({
        assistant: { languageCode: "de-DE", deadlineSeconds: 60 },
        retry: { policy: "exponential", initialDelayMs: 100 },
      }),
    );
    const config = manager({
      configFile: file,
      env: { ASSISTANT_LANGUAGE: "fr-FR", ASSISTANT_RETRY_MAX_ATTEMPTS: "5" },
      overrides: { assistant: { languageCode: "es-ES" } },
    });

    await config.initialize();

    expect(config.getAssistantConfig()).to.include({ languageCode: "es-ES", deadlineSeconds: 60 });
    expect(config.getRetryConfig()).to.include({ policy: "exponential", maxAttempts: 5, initialDelayMs: 100 });
  });

  test("structural problems are rejected before any section is read", async () => {
    const error = await rejection(manager({ overrides: { audio: { sampleRate: 96000 } } }));

    expect(error.code).to.equal("SCHEMA_VIOLATION");
    expect(error.errors.map((e) => e.path)).to.deep.equal(["audio.sampleRate"]);
    expect(error.message).to.equal("Configuration is invalid: /audio/sampleRate must be <= 48000");
  });

  test("environment values that do not parse are reported by the schema", async () => {
    const error = await rejection(manager({ env: { ASSISTANT_DEADLINE_SECONDS: "soon" } }));

    expect(error.code).to.equal("SCHEMA_VIOLATION");
    expect(error.errors[0].path).to.equal("assistant.deadlineSeconds");
  });

  test("unknown keys are rejected", async () => {
    const error = await rejection(manager({ overrides: { assistant: { endpiont: "ws://localhost" } } }));

    expect(error.errors[0].path).to.equal("assistant");
    expect(error.errors[0].message).to.equal("/assistant must NOT have additional properties");
  });

  test("semantic rules fail initialization with their own codes", async () => {
    const error = await rejection(manager({ overrides: { audio: { iterSize: 3201 } } }));

    expect(error.code).to.equal("ITER_SIZE_UNALIGNED");
    expect(error.remediation).to.equal("Use a multiple of 2 bytes.");
  });

  test("warnings are logged and kept in the diagnostics", async () => {
    const config = manager({ overrides: { assistant: { endpoint: "ws://assistant.test/v1/assist" } } });

    await config.initialize();

    expect(config.getDiagnostics()?.warnings.map((w) => w.code)).to.deep.equal(["INSECURE_ENDPOINT"]);
    expect(ctx.entries()).to.deep.include({ level: "warn", message: "Configuration warning" });
  });

  test("a missing config file is a configuration error", async () => {
    const error = await rejection(manager({ configFile: join(directory, "missing.json") }));

    expect(error.code).to.equal("CONFIG_FILE_UNREADABLE");
  });

  test("a config file that is not JSON is a configuration error", async () => {
    const file = join(directory, "broken.json");
    await writeFile(file, "{ assistant");

    expect((await rejection(manager({ configFile: file }))).code).to.equal("CONFIG_FILE_INVALID_JSON");
  });

  test("a config file whose sections are not objects is rejected", async () => {
    const file = join(directory, "flat.json");
    await writeFile(file, JSON.stringify({ assistant: "ws://localhost" }));

    expect((await rejection(manager({ configFile: file }))).code).to.equal("CONFIG_FILE_INVALID_SHAPE");
  });

  test("dispose forgets cached sections", async () => {
    const config = manager();
    await config.initialize();
    const first = config.getAudioConfig();

    expect(config.getAudioConfig()).to.equal(first);
    config.dispose();

    expect(config.isInitialized()).to.equal(false);
    expect(config.getAudioConfig()).to.not.equal(first);
  });
});
