import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  AxiosTransport,
  ClientError,
  FileClient,
  FileClientError,
  createFileClient,
  createFileClientFromEnv,
  loadConfig,
} from "../index";

const ENV_KEYS = [
  "FILE_API_BASE_URL",
  "FILE_API_PATH",
  "NODE_ENV",
  "LOG_LEVEL",
  "FILE_API_DEBUG_RESPONSES",
  "FILE_API_TIMEOUT_MS",
];

describe("createFileClient", () => {
  it("should wire a FileClient against the configured endpoint", () => {
    const config = loadConfig({
      FILE_API_BASE_URL: "https://storage.example.com/",
      FILE_API_PATH: "/file",
      NODE_ENV: "production",
      LOG_LEVEL: "silent",
    });

    const client = createFileClient(config);

    expect(client).toBeInstanceOf(FileClient);
    expect(client.getEndpoint()).toBe("https://storage.example.com/file");
  });

  it("should export the transport and error taxonomy", () => {
    expect(new ClientError(404)).toBeInstanceOf(FileClientError);
    expect(typeof AxiosTransport).toBe("function");
  });
});

describe("createFileClientFromEnv", () => {
  const originalEnv = { ...process.env };
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "file-client-env-"));
    // dotenv never overrides variables that are already set
    for (const key of ENV_KEYS) delete process.env[key];
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should build the client from a .env file", () => {
    const envPath = path.join(tmpDir, ".env");
    fs.writeFileSync(
      envPath,
      [
        "FILE_API_BASE_URL=https://files.internal.test",
        "FILE_API_PATH=v2/file",
        "NODE_ENV=production",
        "LOG_LEVEL=silent",
      ].join("\n"),
    );

    const client = createFileClientFromEnv(envPath);

    expect(client).toBeInstanceOf(FileClient);
    expect(client.getEndpoint()).toBe("https://files.internal.test/v2/file");
    expect(process.env.FILE_API_PATH).toBe("v2/file");
  });

  it("should let variables already in the environment win over the file", () => {
    const envPath = path.join(tmpDir, ".env");
    fs.writeFileSync(
      envPath,
      "FILE_API_BASE_URL=https://from-file.test\nNODE_ENV=production\nLOG_LEVEL=silent\n",
    );
    process.env.FILE_API_BASE_URL = "https://from-env.test";

    const client = createFileClientFromEnv(envPath);

    expect(client.getEndpoint()).toBe("https://from-env.test/file");
  });
});
