import { SENSOR_COMMANDS, registerSensorReportHandlers } from "../../../src/device/handlers/sensor-reports";
import { NoOpHardwareCapability, pressureToAltitude, type SensorReading } from "../../../src/device/hardware/hardware-capability";
import type { TextToSpeech } from "../../../src/speech/text-to-speech";
import type { CommandExecutionContext, DeviceCommandHandler } from "../../../src/types/device-action";
import { expect } from "../../helpers/chai-setup";
import { createTestContext } from "../../helpers/fakes";
import { suite, test } from "../../mocha-globals";

class StubHardware extends NoOpHardwareCapability {
  humidity: SensorReading[] = [];
  humidityReads = 0;

  async readLightLevel(): Promise<number> {
    return 42;
  }

  async readHumidity(): Promise<SensorReading> {
    this.humidityReads += 1;
    const [next] = this.humidity.splice(0, 1);
    return next ?? { value: 0, valid: false };
  }

  async readTemperature(): Promise<number> {
    return 21.5;
  }

  async readPressure(): Promise<number> {
    return 101_325;
  }

  async readAltitude(): Promise<number> {
    return 12.3;
  }
}

class RecordingSpeech implements TextToSpeech {
  readonly spoken: string[] = [];

  async speak(text: string): Promise<void> {
    this.spoken.push(text);
  }
}

const CTX: CommandExecutionContext = { actionId: "a-1", command: "x", deviceId: "d" };

function setup() {
  const handlers = new Map<string, DeviceCommandHandler>();
  const hardware = new StubHardware();
  const speech = new RecordingSpeech();
  const sleeps: number[] = [];
  registerSensorReportHandlers(
    { register: (name: string, handler: DeviceCommandHandler) => handlers.set(name, handler) },
    {
      hardware,
      speech,
      logger: createTestContext().logger,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    },
  );
  const run = async (name: string): Promise<void> => {
    const handler = handlers.get(name);
    if (!handler) {
      throw new Error(`no handler for ${name}`);
    }
    await handler({}, CTX);
  };
  return { handlers, hardware, speech, sleeps, run };
}

suite("Unit: sensor report handlers", () => {
  test("registers one handler per sensor", () => {
    const { handlers } = setup();

    expect([...handlers.keys()]).to.have.members(Object.values(SENSOR_COMMANDS));
  });

  test("speaks formatted readings", async () => {
    const { run, speech } = setup();

    await run(SENSOR_COMMANDS.lightSensor);
    await run(SENSOR_COMMANDS.temperature);
    await run(SENSOR_COMMANDS.pressure);
    await run(SENSOR_COMMANDS.altitude);

    expect(speech.spoken).to.deep.equal([
      "The light sensor reads 42.00 percent.",
      "The room temperature is 21.50 degrees.",
      "The air pressure is 1013.25 hectopascals.",
      "The altitude is 12.30 meters.",
    ]);
  });

  test("retries humidity until a valid reading arrives", async () => {
    const { run, speech, hardware, sleeps } = setup();
    hardware.humidity = [
      { value: 0, valid: false },
      { value: 0, valid: false },
      { value: 55, valid: true },
    ];

    await run(SENSOR_COMMANDS.humidity);

    expect(hardware.humidityReads).to.equal(3);
    expect(sleeps).to.deep.equal([500, 500]);
    expect(speech.spoken).to.deep.equal(["The humidity is 55 percent."]);
  });

  test("gives up on humidity after twenty unusable readings", async () => {
    const { run, speech, hardware, sleeps } = setup();

    await run(SENSOR_COMMANDS.humidity);

    expect(hardware.humidityReads).to.equal(20);
    expect(sleeps).to.have.length(20);
    expect(speech.spoken).to.deep.equal(["Reading the humidity timed out."]);
  });

  test("pressureToAltitude is zero at sea level and grows as pressure drops", () => {
    expect(pressureToAltitude(101_325, 101_325)).to.equal(0);
    expect(pressureToAltitude(0, 101_325)).to.equal(0);
    expect(pressureToAltitude(89_875, 101_325)).to.be.closeTo(1000, 5);
  });
});
