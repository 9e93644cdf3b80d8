import { DEFAULT_GENERATE_POLICY, generatePassword, generatePolicy } from "./password.js";

describe("generatePassword", () => {
  it("should honour the minimum length", () => {
    expect(generatePassword(DEFAULT_GENERATE_POLICY)).toHaveLength(22);
    expect(generatePassword(generatePolicy({ minLength: 40 }))).toHaveLength(40);
  });

  it("should include a character of every enabled class", () => {
    const value = generatePassword(generatePolicy({ minLength: 4 }));

    expect(value).toMatch(/[a-z]/);
    expect(value).toMatch(/[A-Z]/);
    expect(value).toMatch(/[0-9]/);
    expect(value).toMatch(/[-_.~()*+!?]/);
  });

  it("should leave out disabled classes", () => {
    const value = generatePassword(generatePolicy({ upper: false, special: false }));

    expect(value).toMatch(/^[a-z0-9]{22}$/);
  });

  it("should reject a policy with every class disabled", () => {
    expect(() =>
      generatePassword(generatePolicy({ lower: false, upper: false, numeric: false, special: false })),
    ).toThrow(expect.objectContaining({ code: "ERR_INVALID_DEFINITION", field: "generate" }));
  });
});
