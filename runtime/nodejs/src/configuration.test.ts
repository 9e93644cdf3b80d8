import { Configuration } from "./configuration.js";

describe("Configuration", () => {
  it("should compare keys case-insensitively", () => {
    const configuration = new Configuration({ "Parameters:Region": "eu-west" });

    expect(configuration.get("parameters:region")).toBe("eu-west");
    expect(configuration.has("PARAMETERS:REGION")).toBe(true);
  });

  it("should map double underscores in environment variables to sections", () => {
    const configuration = new Configuration().addEnvironmentVariables({
      Parameters__region: "ap-south",
      ConnectionStrings__orders: "Host=db",
      EMPTY: undefined,
    });

    expect(configuration.get("Parameters:region")).toBe("ap-south");
    expect(configuration.get("ConnectionStrings:orders")).toBe("Host=db");
    expect(configuration.has("EMPTY")).toBe(false);
  });

  it("should only take prefixed variables when a prefix is given", () => {
    const configuration = new Configuration().addEnvironmentVariables(
      { APPHOST_Parameters__region: "eu-west", Parameters__zone: "a" },
      "APPHOST_",
    );

    expect(configuration.get("Parameters:region")).toBe("eu-west");
    expect(configuration.has("Parameters:zone")).toBe(false);
  });

  it("should let environment variables override initial values", () => {
    const configuration = new Configuration({ "Parameters:region": "eu-west" }).addEnvironmentVariables({
      PARAMETERS__REGION: "us-east",
    });

    expect(configuration.get("Parameters:region")).toBe("us-east");
  });
});
