import { describe, it, expect } from "vitest";
import { CommandRouter, bindArguments } from "../router";
import { CommandRegistry } from "../registry";
import { ArgumentParser } from "../parser/argument-parser";
import { defineArgument, defineCommand, defineOption } from "../definitions/types";
import { Types } from "../convert/value-types";

class NoopCommand {}

function gitRegistry(): CommandRegistry {
  const registry = new CommandRegistry();
  registry.register(defineCommand({ name: "git", commandType: NoopCommand }));
  registry.register(defineCommand({ name: "remote", parent: "git", aliases: ["r"], commandType: NoopCommand }));
  registry.register(defineCommand({ name: "add", parent: "git.remote", commandType: NoopCommand }));
  registry.register(defineCommand({ name: "status", commandType: NoopCommand }));
  return registry;
}

describe("CommandRouter", () => {
  const router = new CommandRouter(gitRegistry());

  it("matches the deepest command", () => {
    const route = router.route(["git", "remote", "add", "origin", "https://example.test/repo.git"]);
    expect(route.command?.name).toBe("add");
    expect(route.commandPath).toEqual(["git", "remote", "add"]);
    expect(route.remainingArgs).toEqual(["origin", "https://example.test/repo.git"]);
  });

  it("records canonical names when routing through aliases", () => {
    const route = router.route(["GIT", "r", "add"]);
    expect(route.commandPath).toEqual(["git", "remote", "add"]);
  });

  it("stops at the first option-like token", () => {
    const route = router.route(["git", "--verbose", "remote"]);
    expect(route.command?.name).toBe("git");
    expect(route.remainingArgs).toEqual(["--verbose", "remote"]);
  });

  it("does not descend into a child of another parent", () => {
    const route = router.route(["status", "add"]);
    expect(route.command?.name).toBe("status");
    expect(route.remainingArgs).toEqual(["add"]);
  });

  it("returns no command when the first token is unknown", () => {
    const route = router.route(["push", "now"]);
    expect(route.command).toBeNull();
    expect(route.commandPath).toEqual([]);
    expect(route.remainingArgs).toEqual(["push", "now"]);
  });

  it("returns the whole input when the first token is option-like", () => {
    expect(router.route(["--help", "x"])).toEqual({ command: null, commandPath: [], remainingArgs: ["--help", "x"] });
    expect(router.route(["-v", "git"])).toEqual({ command: null, commandPath: [], remainingArgs: ["-v", "git"] });
  });

  it("treats a windows-style token as option-like", () => {
    expect(router.route(["/x", "git"])).toEqual({ command: null, commandPath: [], remainingArgs: ["/x", "git"] });
  });

  it("returns no command for an empty vector", () => {
    expect(router.route([])).toEqual({ command: null, commandPath: [], remainingArgs: [] });
  });

  it("treats a slash token as a command name when windows style is off", () => {
    const registry = new CommandRegistry();
    registry.register(defineCommand({ name: "/run", commandType: NoopCommand }));
    const plain = new CommandRouter(registry, new ArgumentParser({ allowWindowsStyle: false }));

    expect(plain.route(["/run"]).command?.name).toBe("/run");
    expect(new CommandRouter(registry).route(["/run"]).command).toBeNull();
  });

  it("parses remaining arguments with its parser", () => {
    const parsed = router.parseArguments(["-p", "3000", "file"]);
    expect(parsed.getOptionValue("p")).toBe("3000");
    expect(parsed.positional).toEqual(["file"]);
  });
});

describe("bindArguments", () => {
  const definition = defineCommand({
    name: "copy",
    commandType: NoopCommand,
    arguments: [
      defineArgument({ name: "target", position: 1 }),
      defineArgument({ name: "source", position: 0 }),
    ],
    options: [
      defineOption({ name: "port", shortName: "p", valueType: Types.int }),
      defineOption({ name: "force", shortName: "f", valueType: Types.bool }),
    ],
  });

  it("binds positionals by ascending position", () => {
    const parsed = bindArguments(new ArgumentParser().parse(["a.txt", "b.txt", "extra"]), definition);
    expect(parsed.getNamedArgument("source")).toBe("a.txt");
    expect(parsed.getNamedArgument("target")).toBe("b.txt");
    expect(parsed.positional).toEqual(["a.txt", "b.txt", "extra"]);
  });

  it("leaves missing arguments unbound", () => {
    const parsed = bindArguments(new ArgumentParser().parse(["a.txt"]), definition);
    expect(parsed.hasNamedArgument("target")).toBe(false);
  });

  it("copies short-name values onto the long name", () => {
    const parsed = bindArguments(new ArgumentParser().parse(["-p", "3000", "-f"]), definition);
    expect(parsed.getOptionValue("port")).toBe("3000");
    expect(parsed.hasOption("force")).toBe(true);
    expect(parsed.getOptionValue("force")).toBeUndefined();
  });

  it("appends short values after long ones", () => {
    const parsed = bindArguments(new ArgumentParser().parse(["--port=1", "-p", "2"]), definition);
    expect(parsed.getOptionValues("port")).toEqual(["1", "2"]);
  });
});
