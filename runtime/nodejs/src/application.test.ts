import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import type { RuntimeEvent } from "@apphost/sdk";
import { DistributedApplication } from "./application.js";

describe("DistributedApplication", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "apphost-app-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("publish", () => {
    it("should write manifest.json into a directory", async () => {
      const builder = DistributedApplication.createBuilder({
        args: ["--publisher", "manifest"],
        environment: {},
      });
      builder.addContainer("cache", "redis", "7.2");
      const app = builder.build();

      const written = await app.publish(path.join(dir, "out"));

      expect(written).toBe(path.join(dir, "out", "manifest.json"));
      expect(await fs.readFile(written, "utf-8")).toBe(
        [
          "{",
          '  "resources": {',
          '    "cache": {',
          '      "type": "container.v0",',
          '      "image": "redis:7.2"',
          "    }",
          "  }",
          "}",
          "",
        ].join("\n"),
      );
    });

    it("should use a path ending in .json as the file", async () => {
      const builder = DistributedApplication.createBuilder({
        args: ["--publisher", "manifest", "--output-path", path.join(dir, "app.json")],
        environment: {},
      });
      builder.addContainer("cache", "redis");
      const events: RuntimeEvent[] = [];
      builder.on("Manifest.Written", (event) => {
        events.push(event);
      });

      const result = await builder.build().run();

      expect(result).toBe(path.join(dir, "app.json"));
      expect(events).toEqual([
        { name: "Manifest.Written", payload: { path: path.join(dir, "app.json"), resources: 1 } },
      ]);
    });
  });

  describe("run", () => {
    it("should allocate endpoints and evaluate every service environment", async () => {
      const builder = DistributedApplication.createBuilder({
        configuration: { "Parameters:cache-pass": "test-secret" },
        environment: {},
      });
      const pass = builder.addParameter("cache-pass", { secret: true });
      const cache = builder
        .addContainer("cache", "redis")
        .withEndpoint({ name: "tcp", targetPort: 6379 })
        .withConnectionString("{tcp.host}:{tcp.port},password={cache-pass.value}");
      builder.addProject("api", "./src/Api").withReference(cache).withEnvironment("CACHE_PASS", pass);

      const result = await builder.build().run({ basePort: 41000 });

      expect(result).toEqual({
        allocations: [{ resource: "cache", endpoint: "tcp", host: "localhost", port: 41000 }],
        environment: new Map([
          ["cache", new Map()],
          [
            "api",
            new Map([
              ["CACHE_PASS", "test-secret"],
              ["ConnectionStrings__cache", "localhost:41000,password=test-secret"],
            ]),
          ],
        ]),
      });
    });

    it("should resolve resources by name", async () => {
      const builder = DistributedApplication.createBuilder({
        environment: { ConnectionStrings__orders: "Host=db" },
      });
      builder.addConnectionString("orders");
      const app = builder.build();

      expect(await app.getConnectionString("orders")).toBe("Host=db");
      expect(app.getResource("ORDERS").name).toBe("orders");
    });
  });
});
