import { describe, it, expect } from "vitest";
import { ArgumentParser, parseArgs } from "../parser/argument-parser";

describe("ArgumentParser", () => {
  const parser = new ArgumentParser();

  describe("long options", () => {
    it("splits --name=value on the first equals sign", () => {
      const parsed = parser.parse(["--filter=a=b"]);
      expect(parsed.getOptionValue("filter")).toBe("a=b");
    });

    it("keeps an empty value after the equals sign", () => {
      const parsed = parser.parse(["--name="]);
      expect(parsed.hasOption("name")).toBe(true);
      expect(parsed.getOptionValues("name")).toEqual([""]);
    });

    it("never consumes the next token", () => {
      const parsed = parser.parse(["--verbose", "file.txt"]);
      expect(parsed.hasOption("verbose")).toBe(true);
      expect(parsed.getOptionValue("verbose")).toBeUndefined();
      expect(parsed.positional).toEqual(["file.txt"]);
    });

    it("treats a leading equals sign as part of the name", () => {
      const parsed = parser.parse(["--=x"]);
      expect(parsed.hasOption("=x")).toBe(true);
    });
  });

  describe("short options", () => {
    it("takes the following token as value", () => {
      const parsed = parser.parse(["-p", "3000"]);
      expect(parsed.getOptionValue("p")).toBe("3000");
      expect(parsed.positional).toEqual([]);
    });

    it("does not take an option-like token as value", () => {
      const parsed = parser.parse(["-v", "-q"]);
      expect(parsed.hasOption("v")).toBe(true);
      expect(parsed.getOptionValue("v")).toBeUndefined();
      expect(parsed.hasOption("q")).toBe(true);
    });

    it("does not take a negative number as value", () => {
      const parsed = parser.parse(["-n", "-5"]);
      expect(parsed.getOptionValue("n")).toBeUndefined();
      expect(parsed.hasOption("5")).toBe(true);
    });

    it("expands combined flags without values", () => {
      const parsed = parser.parse(["-abc", "value"]);
      expect(parsed.optionNames).toEqual(["a", "b", "c"]);
      expect(parsed.getOptionValue("c")).toBeUndefined();
      expect(parsed.positional).toEqual(["value"]);
    });

    it("keeps a combined group as one name when expansion is off", () => {
      const parsed = new ArgumentParser({ allowCombinedShortOptions: false }).parse(["-abc"]);
      expect(parsed.optionNames).toEqual(["abc"]);
    });

    it("accumulates repeated values", () => {
      const parsed = parser.parse(["-t", "x", "-t", "y", "--t=z"]);
      expect(parsed.getOptionValues("t")).toEqual(["x", "y", "z"]);
    });
  });

  describe("windows style", () => {
    it("reads /name value", () => {
      const parsed = parser.parse(["/out", "build"]);
      expect(parsed.getOptionValue("out")).toBe("build");
    });

    it("treats /name as positional when disabled", () => {
      const parsed = new ArgumentParser({ allowWindowsStyle: false }).parse(["/out", "build"]);
      expect(parsed.hasOption("out")).toBe(false);
      expect(parsed.positional).toEqual(["/out", "build"]);
    });

    it("leaves a lone slash positional", () => {
      expect(parser.parse(["/"]).positional).toEqual(["/"]);
    });
  });

  describe("end of options", () => {
    it("treats everything after -- as positional", () => {
      const parsed = parser.parse(["-a", "--", "-b", "--c", "--"]);
      expect(parsed.optionNames).toEqual(["a"]);
      expect(parsed.positional).toEqual(["-b", "--c", "--"]);
    });
  });

  it("keeps a lone dash and empty strings positional", () => {
    const parsed = parser.parse(["-", ""]);
    expect(parsed.positional).toEqual(["-", ""]);
  });

  it("never throws on unusual input", () => {
    expect(() => parser.parse(["---", "-=", "/=", "--a=", "é"])).not.toThrow();
  });

  it("matches option names case-insensitively", () => {
    const parsed = parser.parse(["--Name", "x"]);
    expect(parsed.hasOption("name")).toBe(true);
    expect(parsed.optionNames).toEqual(["Name"]);
  });

  describe("isOptionLike", () => {
    it("follows the windows setting", () => {
      expect(parser.isOptionLike("/x")).toBe(true);
      expect(new ArgumentParser({ allowWindowsStyle: false }).isOptionLike("/x")).toBe(false);
      expect(parser.isOptionLike("-")).toBe(true);
      expect(parser.isOptionLike("")).toBe(false);
      expect(parser.isOptionLike("run")).toBe(false);
    });
  });

  it("parseArgs uses a fresh parser", () => {
    const parsed = parseArgs(["build", "--watch"], { allowWindowsStyle: false });
    expect(parsed.positional).toEqual(["build"]);
    expect(parsed.hasOption("watch")).toBe(true);
  });
});
