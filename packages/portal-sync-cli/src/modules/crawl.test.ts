import { describe, it, expect } from "vitest";
import { Command, InvalidArgumentError } from "commander";
import { addTransferOptions, parseConcurrency, parseInteger } from "./crawl.js";

describe("transfer option parsing", () => {
  it("accepts plain non-negative integers", () => {
    expect(parseInteger("0")).toBe(0);
    expect(parseInteger("12")).toBe(12);
  });

  it.each(["-1", "2.5", "abc", ""])("rejects %j as an integer", (value) => {
    expect(() => parseInteger(value)).toThrow(InvalidArgumentError);
  });

  it("keeps concurrency within 1 to 16", () => {
    expect(parseConcurrency("1")).toBe(1);
    expect(parseConcurrency("16")).toBe(16);
    expect(() => parseConcurrency("0")).toThrow(
      "Expected a number of parallel transfers from 1 to 16."
    );
    expect(() => parseConcurrency("17")).toThrow(InvalidArgumentError);
  });

  it("refuses --concurrency 0 on the command line", async () => {
    const program = new Command().exitOverride().configureOutput({ writeErr: () => {} });
    addTransferOptions(program.command("sync")).action(() => {});

    await expect(
      program.parseAsync(["node", "portal-sync", "sync", "--concurrency", "0"])
    ).rejects.toMatchObject({ code: "commander.invalidArgument" });
  });
});
