import { describe, expect, it } from "vitest";
import * as catalogApi from "./index.js";
import { FakeCatalogApi } from "./testing.js";

describe("package entry points", () => {
  it("keeps the in-process fake out of the main entry", () => {
    expect(Object.keys(catalogApi)).not.toContain("FakeCatalogApi");
    expect(typeof FakeCatalogApi).toBe("function");
  });
});
