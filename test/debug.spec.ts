import { afterEach, describe, expect, it, vi } from "vitest";
import { isDebugEnabled, setDebugEnabled } from "../src";
import { buildMlp } from "./helpers/graphs";

describe("debug logging", () => {
  afterEach(() => {
    setDebugEnabled(false);
    vi.restoreAllMocks();
  });

  it("logs compositions and gradients when enabled", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    setDebugEnabled(true);

    const { net } = buildMlp();
    net.grad(["x"]);

    expect(isDebugEnabled()).toBe(true);
    expect(log).toHaveBeenCalledWith(
      "[compose] name=fc1 args=x,fc1_weight,fc1_bias",
    );
    expect(log).toHaveBeenCalledWith(
      "[compose] name=relu1 args=x,fc1_weight,fc1_bias",
    );
    expect(log).toHaveBeenCalledWith("[grad] forward=5 appended=3 wrt=x");
  });

  it("stays silent when disabled", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    setDebugEnabled(false);

    buildMlp().net.grad(["x"]);

    expect(log).not.toHaveBeenCalled();
  });
});
