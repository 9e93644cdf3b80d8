import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import type { RuntimeEvent } from "@apphost/sdk";
import { envCommand, manifestCommand } from "./commands.js";

const APP = `
name: shop
resources:
  - kind: Project
    name: api
    path: ./src/Api
    references:
      - vectors
  - kind: Qdrant.Server
    name: vectors
    apiKey: vectors-key
  - kind: Parameter
    name: vectors-key
    secret: true
`;

describe("CLI commands", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "apphost-cli-"));
    file = path.join(dir, "app.yaml");
    await fs.writeFile(file, APP, "utf-8");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("manifestCommand", () => {
    it("should render the whole application", async () => {
      const output = await manifestCommand({ path: file, environment: {} });

      expect(Object.keys(JSON.parse(output).resources)).toEqual(["vectors-key", "api", "vectors"]);
    });

    it("should render a single resource", async () => {
      const output = await manifestCommand({ path: file, resource: "api", environment: {} });

      expect(JSON.parse(output)).toEqual({
        type: "project.v0",
        path: "./src/Api",
        env: {
          ConnectionStrings__vectors: "{vectors.connectionString}",
          ConnectionStrings__vectors_rest:
            "Endpoint={vectors.bindings.rest.scheme}://{vectors.bindings.rest.host}:{vectors.bindings.rest.port};Key={vectors-key.value}",
        },
      });
    });

    it("should write the manifest to the output path", async () => {
      const events: RuntimeEvent[] = [];
      const target = path.join(dir, "publish");

      const written = await manifestCommand({
        path: file,
        outputPath: target,
        environment: {},
        onEvent: (event) => {
          events.push(event);
        },
      });

      expect(written).toBe(path.join(target, "manifest.json"));
      expect(JSON.parse(await fs.readFile(written, "utf-8")).resources.api.type).toBe("project.v0");
      expect(events.map((event) => event.name)).toEqual([
        "Resource.Added",
        "Resource.Added",
        "Resource.Added",
        "Application.Built",
        "Manifest.Written",
      ]);
    });

    it("should fail for an unknown resource", async () => {
      await expect(manifestCommand({ path: file, resource: "db", environment: {} })).rejects.toMatchObject({
        code: "ERR_RESOURCE_NOT_FOUND",
      });
    });
  });

  describe("envCommand", () => {
    it("should print the run-mode environment", async () => {
      const output = await envCommand({
        path: file,
        resource: "api",
        basePort: 42000,
        environment: { "Parameters__vectors-key": "test-secret" },
      });

      expect(output).toBe(
        [
          "ConnectionStrings__vectors=Endpoint=http://localhost:42000;Key=test-secret",
          "ConnectionStrings__vectors_rest=Endpoint=http://localhost:42001;Key=test-secret",
        ].join("\n"),
      );
    });

    it("should fail when a parameter has no value", async () => {
      await expect(envCommand({ path: file, resource: "vectors", environment: {} })).rejects.toMatchObject({
        code: "ERR_MISSING_PARAMETER_VALUE",
        resource: "vectors-key",
      });
    });
  });
});
