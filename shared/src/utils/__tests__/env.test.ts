import { getEnvBoolean, getEnvList, getEnvNumber, getEnvString } from "../env";

describe("getEnvBoolean", () => {
  const ORIGINAL_ENV = { ...process.env };

  afterEach(() => {
    process.env = { ...ORIGINAL_ENV };
  });

  it("returns default when unset", () => {
    delete process.env.TEST_FLAG;
    expect(getEnvBoolean("TEST_FLAG", false)).toBe(false);
    expect(getEnvBoolean("TEST_FLAG", true)).toBe(true);
  });

  it("treats truthy strings as true", () => {
    ["1", "true", "yes", "on", " TRUE  "].forEach((v) => {
      process.env.TEST_FLAG = v;
      expect(getEnvBoolean("TEST_FLAG", false)).toBe(true);
    });
  });

  it("treats falsy strings as false", () => {
    ["0", "false", "no", "off", " False "].forEach((v) => {
      process.env.TEST_FLAG = v;
      expect(getEnvBoolean("TEST_FLAG", true)).toBe(false);
    });
  });

  it("falls back to the default for unrecognised values", () => {
    process.env.TEST_FLAG = "maybe";
    expect(getEnvBoolean("TEST_FLAG", true)).toBe(true);
  });
});

describe("getEnvNumber", () => {
  const ORIGINAL_ENV = { ...process.env };

  afterEach(() => {
    process.env = { ...ORIGINAL_ENV };
  });

  it("parses numeric strings", () => {
    process.env.TEST_NUM = " 42 ";
    expect(getEnvNumber("TEST_NUM", 7)).toBe(42);
  });

  it("returns default for blank or non-numeric values", () => {
    process.env.TEST_NUM = "";
    expect(getEnvNumber("TEST_NUM", 7)).toBe(7);
    process.env.TEST_NUM = "ten";
    expect(getEnvNumber("TEST_NUM", 7)).toBe(7);
  });
});

describe("getEnvString / getEnvList", () => {
  const ORIGINAL_ENV = { ...process.env };

  afterEach(() => {
    process.env = { ...ORIGINAL_ENV };
  });

  it("trims strings and treats blank as unset", () => {
    process.env.TEST_STR = "  value ";
    expect(getEnvString("TEST_STR", "x")).toBe("value");
    process.env.TEST_STR = "   ";
    expect(getEnvString("TEST_STR", "x")).toBe("x");
  });

  it("splits comma lists", () => {
    process.env.TEST_LIST = ".nii, .dcm,,";
    expect(getEnvList("TEST_LIST", [])).toEqual([".nii", ".dcm"]);
    delete process.env.TEST_LIST;
    expect(getEnvList("TEST_LIST", ["a"])).toEqual(["a"]);
  });
});
