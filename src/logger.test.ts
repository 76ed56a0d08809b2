import { describe, it, expect, vi, afterEach } from "vitest";
import { debug, setVerbose, warn } from "./logger.js";

afterEach(() => {
  setVerbose(false);
  vi.restoreAllMocks();
});

describe("logger", () => {
  it("drops debug messages unless verbose", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    setVerbose(false);
    debug("hidden");
    expect(spy).not.toHaveBeenCalled();

    setVerbose(true);
    debug("loaded 3 records");
    expect(spy).toHaveBeenCalledWith("[debug] loaded 3 records");
  });

  it("always writes warnings to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    warn("no records for year 1999");
    expect(spy).toHaveBeenCalledWith("warning: no records for year 1999");
  });
});
