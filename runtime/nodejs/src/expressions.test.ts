import { parseTemplate, renderTemplate } from "./expressions.js";

describe("Templates", () => {
  describe("parseTemplate", () => {
    it("should split literals and placeholders", () => {
      expect(parseTemplate("Endpoint={http.url};Key={api-key.value}")).toEqual([
        { kind: "literal", text: "Endpoint=" },
        { kind: "placeholder", raw: "http.url", target: "http", property: "url" },
        { kind: "literal", text: ";Key=" },
        { kind: "placeholder", raw: "api-key.value", target: "api-key", property: "value" },
      ]);
    });

    it("should return a single literal for text without braces", () => {
      expect(parseTemplate("host=localhost")).toEqual([{ kind: "literal", text: "host=localhost" }]);
    });

    it("should return no segments for an empty template", () => {
      expect(parseTemplate("")).toEqual([]);
    });

    it.each([
      ["a stray closing brace", "Endpoint=}"],
      ["an unterminated placeholder", "Endpoint={http.url"],
      ["a nested opening brace", "{http.{url}"],
      ["an unknown property", "{http.path}"],
      ["a placeholder without a property", "{http}"],
      ["an empty placeholder", "{}"],
    ])("should reject %s", (_label, template) => {
      expect(() => parseTemplate(template, "cache")).toThrow(
        expect.objectContaining({ code: "ERR_UNRESOLVED_PLACEHOLDER", resource: "cache" }),
      );
    });
  });

  describe("renderTemplate", () => {
    it("should substitute every placeholder in order", async () => {
      const segments = parseTemplate("{http.scheme}://{http.host}:{http.port}");
      const values: Record<string, string> = { scheme: "http", host: "localhost", port: "6334" };

      const output = await renderTemplate(segments, (placeholder) => values[placeholder.property]);

      expect(output).toBe("http://localhost:6334");
    });

    it("should not rescan substituted values", async () => {
      const segments = parseTemplate("Key={pass.value}");

      const output = await renderTemplate(segments, async () => "{pass.value}");

      expect(output).toBe("Key={pass.value}");
    });
  });
});
