import { describe, it, expect } from "vitest";
import { parseCommand, parseImageArgs, parseLimitArgs } from "./commandArgs.js";

describe("parseCommand", () => {
  it("should lowercase the command and strip the bot mention", () => {
    expect(parseCommand("/Image@SurferBot a cat  --size 512")).toEqual({
      command: "/image",
      argsText: "a cat  --size 512",
      args: ["a", "cat", "--size", "512"],
    });
  });

  it("should return empty args for a bare command", () => {
    expect(parseCommand("  /help  ")).toEqual({ command: "/help", argsText: "", args: [] });
  });

  it("should ignore plain text", () => {
    expect(parseCommand("hello there")).toBeNull();
  });
});

describe("parseImageArgs", () => {
  it("should extract every flag and keep the rest as the prompt", () => {
    expect(parseImageArgs("a red fox --size 512 --seed 42 --no blurry, dark")).toEqual({
      prompt: "a red fox",
      size: "512",
      seed: 42,
      negative: "blurry, dark",
    });
  });

  it("should leave an unsupported size in the prompt", () => {
    const request = parseImageArgs("castle --size 256");

    expect(request.prompt).toBe("castle --size 256");
    expect(request.size).toBeUndefined();
  });

  it("should collapse whitespace left behind by removed flags", () => {
    expect(parseImageArgs("--seed 7   mountain   lake").prompt).toBe("mountain lake");
  });

  it("should give an empty prompt when only flags are present", () => {
    expect(parseImageArgs("--size 768").prompt).toBe("");
  });
});

describe("parseLimitArgs", () => {
  it("should parse a user id and a daily limit", () => {
    expect(parseLimitArgs(["42", "15"])).toEqual({ userId: "42", daily: 15 });
  });

  it.each([{ args: ["42"] }, { args: ["42", "x"] }, { args: ["42", "-1"] }, { args: ["../usage_images", "5"] }, { args: [] }])(
    "should reject $args",
    ({ args }) => {
      expect(parseLimitArgs(args)).toBeNull();
    },
  );
});
