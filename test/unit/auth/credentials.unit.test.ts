import { loadAccessToken } from "../../../src/auth/credentials";
import { ConfigurationError } from "../../../src/core/errors";
import { expect } from "../../helpers/chai-setup";
import { suite, test } from "../../mocha-globals";

async function failure(promise: Promise<unknown>): Promise<ConfigurationError> {
  try {
    await promise;
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a configuration error");
}

const unread = async (path: string): Promise<string> => {
  throw new Error(`unexpected read of ${path}`);
};

suite("Unit: loadAccessToken", () => {
  test("a direct token wins over the credentials file", async () => {
    const token = await loadAccessToken({ accessToken: "test-token", credentialsPath: "/creds.json" }, unread);

    expect(token).to.equal("test-token");
  });

  test("reads token or access_token from the credentials file", async () => {
    expect(
      await loadAccessToken({ credentialsPath: "/creds.json" }, async () => '{"token":"file-token"}'),
    ).to.equal("file-token");
    expect(
      await loadAccessToken({ credentialsPath: "/creds.json" }, async () => '{"access_token":"other-token"}'),
    ).to.equal("other-token");
  });

  test("no token source is an auth error", async () => {
    const error = await failure(loadAccessToken({}, unread));

    expect(error.faultDomain).to.equal("auth");
    expect(error.code).to.equal("CREDENTIALS_MISSING");
  });

  test("unreadable or tokenless files are auth errors", async () => {
    const broken = await failure(loadAccessToken({ credentialsPath: "/creds.json" }, async () => "not json"));
    const empty = await failure(loadAccessToken({ credentialsPath: "/creds.json" }, async () => '{"token":""}'));

    expect(broken.code).to.equal("CREDENTIALS_UNREADABLE");
    expect(empty.code).to.equal("CREDENTIALS_NO_TOKEN");
    expect(empty.message).to.equal('Credentials file /creds.json holds no "token" or "access_token"');
  });
});
