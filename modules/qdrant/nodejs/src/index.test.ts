import {
  DistributedApplication,
  Loader,
  registerBuiltinControllers,
  ControllerRegistry,
  stringifyManifest,
} from "@apphost/runtime";
import { annotationsOfType, findEndpoint } from "@apphost/sdk";
import {
  QdrantContainerImageTags,
  addQdrant,
  registerQdrantControllers,
  withDataBindMount,
  withDataVolume,
} from "./index.js";

const PUBLISH_ARGS = ["--publisher", "manifest"];

function bindingsManifestLines(): string[] {
  return [
    '  "bindings": {',
    '    "http": {',
    '      "scheme": "http",',
    '      "protocol": "tcp",',
    '      "transport": "http",',
    '      "targetPort": 6334',
    "    },",
    '    "rest": {',
    '      "scheme": "http",',
    '      "protocol": "tcp",',
    '      "transport": "http",',
    '      "targetPort": 6333',
    "    }",
    "  }",
  ];
}

describe("Qdrant server resource", () => {
  describe("Annotation metadata", () => {
    it("should add the image, the gRPC endpoint and a generated API key by default", async () => {
      const builder = DistributedApplication.createBuilder({ environment: {} });
      addQdrant(builder, "my-qdrant");
      const app = builder.build();

      const containers = app.getContainerResources();
      expect(containers).toHaveLength(1);
      const [container] = containers;
      expect(container.name).toBe("my-qdrant");

      const images = annotationsOfType(container, "container-image");
      expect(images).toHaveLength(1);
      expect(images[0].image).toBe(QdrantContainerImageTags.image);
      expect(images[0].tag).toBe(QdrantContainerImageTags.tag);
      expect(images[0].registry).toBeUndefined();

      const endpoint = findEndpoint(container, "http");
      expect(endpoint).toBeDefined();
      expect(endpoint?.targetPort).toBe(6334);
      expect(endpoint?.isExternal).toBe(false);
      expect(endpoint?.name).toBe("http");
      expect(endpoint?.port).toBeUndefined();
      expect(endpoint?.protocol).toBe("tcp");
      expect(endpoint?.transport).toBe("http");
      expect(endpoint?.uriScheme).toBe("http");

      const env = await app.getEnvironmentVariables(container);
      expect(Array.from(env.keys())).toEqual(["QDRANT__SERVICE__API_KEY"]);
      expect(env.get("QDRANT__SERVICE__API_KEY")).toMatch(/^[A-Za-z0-9]{22}$/);
    });

    it("should add the REST endpoint", () => {
      const builder = DistributedApplication.createBuilder({ environment: {} });
      addQdrant(builder, "my-qdrant");
      const app = builder.build();

      const [container] = app.getContainerResources();
      const endpoint = findEndpoint(container, "rest");
      expect(endpoint).toBeDefined();
      expect(endpoint?.targetPort).toBe(6333);
      expect(endpoint?.isExternal).toBe(false);
      expect(endpoint?.name).toBe("rest");
      expect(endpoint?.port).toBeUndefined();
      expect(endpoint?.protocol).toBe("tcp");
      expect(endpoint?.transport).toBe("http");
      expect(endpoint?.uriScheme).toBe("http");
    });

    it("should use the configured API key parameter", async () => {
      const builder = DistributedApplication.createBuilder({ environment: {} });
      builder.configuration.set("Parameters:pass", "pass");
      const pass = builder.addParameter("pass");
      addQdrant(builder, "my-qdrant", { apiKey: pass });
      const app = builder.build();

      const [container] = app.getContainerResources();
      expect(container.name).toBe("my-qdrant");
      const env = await app.getEnvironmentVariables(container);
      expect(Array.from(env.entries())).toEqual([["QDRANT__SERVICE__API_KEY", "pass"]]);
    });

    it("should return the same generated key on every evaluation", async () => {
      const builder = DistributedApplication.createBuilder({ environment: {} });
      const qdrant = addQdrant(builder, "my-qdrant");

      const first = await builder.getEnvironmentVariables(qdrant.resource);
      const second = await builder.getEnvironmentVariables(qdrant.resource);
      expect(second.get("QDRANT__SERVICE__API_KEY")).toBe(first.get("QDRANT__SERVICE__API_KEY"));
    });
  });

  describe("Connection strings", () => {
    it("should substitute the allocated gRPC endpoint and key", async () => {
      const builder = DistributedApplication.createBuilder({ environment: {} });
      builder.configuration.set("Parameters:pass", "pass");
      const pass = builder.addParameter("pass");

      const qdrant = addQdrant(builder, "my-qdrant", { apiKey: pass }).withEndpoint("http", (endpoint) => {
        endpoint.allocate("localhost", 6334);
      });

      expect(await qdrant.getConnectionString()).toBe("Endpoint=http://localhost:6334;Key=pass");
    });

    it("should inject both connection strings into a referencing project", async () => {
      const builder = DistributedApplication.createBuilder({ environment: {} });
      builder.configuration.set("Parameters:pass", "pass");
      const pass = builder.addParameter("pass");

      const qdrant = addQdrant(builder, "my-qdrant", { apiKey: pass })
        .withEndpoint("http", (endpoint) => {
          endpoint.allocate("localhost", 6334);
        })
        .withEndpoint("rest", (endpoint) => {
          endpoint.allocate("localhost", 6333);
        });
      const projectA = builder.addProject("projecta", "projectA").withReference(qdrant);

      const env = await builder.getEnvironmentVariables(projectA.resource);
      const connectionKeys = Array.from(env.keys()).filter((key) => key.startsWith("ConnectionStrings__"));
      expect(connectionKeys).toHaveLength(2);
      expect(env.get("ConnectionStrings__my-qdrant")).toBe("Endpoint=http://localhost:6334;Key=pass");
      expect(env.get("ConnectionStrings__my-qdrant_rest")).toBe("Endpoint=http://localhost:6333;Key=pass");
    });

    it("should inject only the REST connection string for a named reference", async () => {
      const builder = DistributedApplication.createBuilder({ environment: {} });
      builder.configuration.set("Parameters:pass", "pass");
      const pass = builder.addParameter("pass");
      const qdrant = addQdrant(builder, "my-qdrant", { apiKey: pass }).withEndpoint("rest", (endpoint) => {
        endpoint.allocate("localhost", 6333);
      });
      const projectA = builder
        .addProject("projecta", "projectA")
        .withReference(qdrant, { endpoint: "rest" });

      const env = await builder.getEnvironmentVariables(projectA.resource);
      expect(Array.from(env.entries())).toEqual([
        ["ConnectionStrings__my-qdrant_rest", "Endpoint=http://localhost:6333;Key=pass"],
      ]);
    });
  });

  describe("Manifest", () => {
    it("should render the generated key parameter in the container manifest", async () => {
      const builder = DistributedApplication.createBuilder({ args: PUBLISH_ARGS, environment: {} });
      const qdrant = addQdrant(builder, "qdrant");

      const manifest = stringifyManifest(await builder.getManifest(qdrant.resource));

      expect(manifest).toBe(
        [
          "{",
          '  "type": "container.v0",',
          '  "connectionString": "Endpoint={qdrant.bindings.http.scheme}://{qdrant.bindings.http.host}:{qdrant.bindings.http.port};Key={qdrant-Key.value}",',
          '  "image": "qdrant/qdrant:v1.8.4",',
          '  "env": {',
          '    "QDRANT__SERVICE__API_KEY": "{qdrant-Key.value}",',
          '    "QDRANT__SERVICE__ENABLE_STATIC_CONTENT": "0"',
          "  },",
          ...bindingsManifestLines(),
          "}",
        ].join("\n"),
      );
    });

    it("should render a supplied key parameter in the container manifest", async () => {
      const builder = DistributedApplication.createBuilder({ args: PUBLISH_ARGS, environment: {} });
      const apiKey = builder.addParameter("QdrantApiKey");
      const qdrant = addQdrant(builder, "qdrant", { apiKey });

      const manifest = stringifyManifest(await builder.getManifest(qdrant.resource));

      expect(manifest).toBe(
        [
          "{",
          '  "type": "container.v0",',
          '  "connectionString": "Endpoint={qdrant.bindings.http.scheme}://{qdrant.bindings.http.host}:{qdrant.bindings.http.port};Key={QdrantApiKey.value}",',
          '  "image": "qdrant/qdrant:v1.8.4",',
          '  "env": {',
          '    "QDRANT__SERVICE__API_KEY": "{QdrantApiKey.value}",',
          '    "QDRANT__SERVICE__ENABLE_STATIC_CONTENT": "0"',
          "  },",
          ...bindingsManifestLines(),
          "}",
        ].join("\n"),
      );
    });

    it("should declare the generated key as a secret parameter without special characters", async () => {
      const builder = DistributedApplication.createBuilder({ args: PUBLISH_ARGS, environment: {} });
      addQdrant(builder, "qdrant");

      const manifest = await builder.getManifest(builder.getResource("qdrant-Key"));

      expect(manifest).toEqual({
        type: "parameter.v0",
        value: "{qdrant-Key.inputs.value}",
        inputs: {
          value: {
            type: "string",
            secret: true,
            default: { generate: { minLength: 22, special: false } },
          },
        },
      });
    });

    it("should mount a named data volume", async () => {
      const builder = DistributedApplication.createBuilder({
        args: PUBLISH_ARGS,
        environment: {},
        appName: "shop",
      });
      const qdrant = withDataVolume(addQdrant(builder, "vectors"));

      const manifest = await builder.getManifest(qdrant.resource);

      expect(manifest).toMatchObject({
        volumes: [{ name: "shop-vectors-data", target: "/qdrant/storage", readOnly: false }],
      });
    });

    it("should bind mount a host directory", async () => {
      const builder = DistributedApplication.createBuilder({ args: PUBLISH_ARGS, environment: {} });
      const qdrant = withDataBindMount(addQdrant(builder, "vectors"), "./data", true);

      const manifest = await builder.getManifest(qdrant.resource);

      expect(manifest).toMatchObject({
        bindMounts: [{ source: "./data", target: "/qdrant/storage", readOnly: true }],
      });
    });
  });

  describe("Qdrant.Server controller", () => {
    function createLoader(): Loader {
      return new Loader(registerQdrantControllers(registerBuiltinControllers(new ControllerRegistry())));
    }

    it("should declare the server with a parameter declared later in the file", async () => {
      const loader = createLoader();
      const definition = loader.parse(
        [
          "name: shop",
          "resources:",
          "  - kind: Qdrant.Server",
          "    name: vectors",
          "    apiKey: vectors-key",
          "    dataVolume: true",
          "  - kind: Parameter",
          "    name: vectors-key",
          "    secret: true",
          "    value: test-secret",
        ].join("\n"),
      );
      const builder = DistributedApplication.createBuilder({ environment: {}, appName: definition.name });
      loader.apply(definition, builder);
      const vectors = builder.getResource("vectors");

      const env = await builder.getEnvironmentVariables(vectors);

      expect(Array.from(env.entries())).toEqual([["QDRANT__SERVICE__API_KEY", "test-secret"]]);
      expect(annotationsOfType(vectors, "mount")).toEqual([
        { type: "mount", kind: "volume", source: "shop-vectors-data", target: "/qdrant/storage", readOnly: false },
      ]);
    });

    it("should reject an API key that names a container", () => {
      const loader = createLoader();
      const definition = loader.parse(
        [
          "name: shop",
          "resources:",
          "  - kind: Container",
          "    name: cache",
          "    image: redis",
          "  - kind: Qdrant.Server",
          "    name: vectors",
          "    apiKey: cache",
        ].join("\n"),
      );
      const builder = DistributedApplication.createBuilder({ environment: {} });

      expect(() => loader.apply(definition, builder)).toThrow(
        expect.objectContaining({ code: "ERR_INVALID_DEFINITION", field: "apiKey" }),
      );
    });
  });
});
