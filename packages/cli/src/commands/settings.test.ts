import { describe, it, expect } from "vitest";
import {
  ICON_ERROR,
  ICON_INFO,
  ICON_SETTINGS,
  ICON_WARNING,
  ICON_WORKFLOW,
} from "@fuzzy-folders/workflow/feedback";
import { createTestContext } from "../test-utils/context.js";
import {
  describeValue,
  loadSettingsCommand,
  settingsCommand,
  updateSettingCommand,
} from "./settings.js";

const SETTINGS = {
  defaults: { min: 1, scope: 1 },
  profiles: {
    "1": { keyword: "dev", dirpath: "/Users/test/Code", min: 3 },
  },
};

describe("describeValue", () => {
  it("names default, scopes and lengths", () => {
    expect(describeValue("min", 0)).toBe("default");
    expect(describeValue("min", 4)).toBe("4");
    expect(describeValue("scope", 2)).toBe("files only");
  });
});

describe("settingsCommand", () => {
  it("lists a profile's settings", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await settingsCommand(t.ctx, "1");

    expect(t.feedback().items).toEqual([
      {
        title: "dev",
        subtitle: "/Users/test/Code",
        valid: false,
        icon: { path: ICON_WORKFLOW },
      },
      {
        title: "Minimum query length : 3",
        subtitle: "The last part of your query must be this long to trigger a search",
        arg: "1 ➣ min ➣ ",
        autocomplete: "1 ➣ min ➣ ",
        valid: false,
        icon: { path: ICON_SETTINGS },
      },
      {
        title: "Search scope : default",
        subtitle: "Should results be folders and/or files?",
        arg: "1 ➣ scope ➣ ",
        autocomplete: "1 ➣ scope ➣ ",
        valid: false,
        icon: { path: ICON_SETTINGS },
      },
    ]);
  });

  it("lists the defaults under profile 0", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await settingsCommand(t.ctx, "0");

    expect(t.feedback().items.map((item) => [item.title, item.subtitle])).toEqual([
      ["Fuzzy Folder Defaults", "Overridden by Folder-specific settings"],
      [
        "Minimum query length : 1",
        "The last part of your query must be this long to trigger a search",
      ],
      ["Search scope : folders only", "Should results be folders and/or files?"],
    ]);
  });

  it("offers to apply a typed value", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await settingsCommand(t.ctx, "1 ➣ scope ➣ 2");

    expect(t.feedback().items).toEqual([
      {
        title: "Set search scope to files only",
        subtitle: "↩ to update",
        arg: "1 ➣ scope ➣ 2",
        valid: true,
        icon: { path: ICON_SETTINGS },
      },
    ]);
  });

  it("calls a value of 0 the default", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await settingsCommand(t.ctx, "1 ➣ min ➣ 0");

    expect(t.feedback().items[0]).toMatchObject({
      title: "Set minimum query length to default",
      arg: "1 ➣ min ➣ 0",
    });
  });

  it("prompts for a minimum length", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await settingsCommand(t.ctx, "1 ➣ min ➣ ");

    expect(t.feedback().items).toEqual([
      {
        title: "Enter a minimum query length",
        subtitle: "Enter 0 to use default",
        valid: false,
        icon: { path: ICON_INFO },
      },
    ]);
  });

  it("offers every scope", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await settingsCommand(t.ctx, "1 ➣ scope ➣ ");

    expect(t.feedback().items.map((item) => [item.title, item.arg])).toEqual([
      ["Folders only", "1 ➣ scope ➣ 1"],
      ["Files only", "1 ➣ scope ➣ 2"],
      ["Folders and files", "1 ➣ scope ➣ 3"],
      ["Default", "1 ➣ scope ➣ 0"],
    ]);
  });

  it("shows an unknown setting as an error", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await settingsCommand(t.ctx, "1 ➣ colour ➣ ");

    expect(t.feedback().items).toEqual([
      {
        title: "Unknown setting : colour",
        subtitle: "Hit ⌫ to choose again",
        valid: false,
        icon: { path: ICON_ERROR },
      },
    ]);
  });

  it("shows out-of-range and non-numeric values as errors", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await settingsCommand(t.ctx, "1 ➣ scope ➣ 7");
    await settingsCommand(t.ctx, "1 ➣ min ➣ x");

    expect(t.output.map((line) => JSON.parse(line).items[0].title)).toEqual([
      "Invalid value for scope : 7",
      "Invalid value for min : x",
    ]);
  });

  it("reports an unknown profile", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await settingsCommand(t.ctx, "9");

    expect(t.feedback().items).toEqual([
      {
        title: "No such keyword / Fuzzy Folder",
        subtitle: "Profile 9 is not defined",
        valid: false,
        icon: { path: ICON_WARNING },
      },
    ]);
  });

  it("backs up to the profile when the trailing space is deleted", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await settingsCommand(t.ctx, "1 ➣ min ➣");

    expect(t.host.runTrigger).toHaveBeenCalledWith("set", "1");
    expect(t.output).toEqual([]);
  });

  it("goes back to search without a profile", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await settingsCommand(t.ctx, "");

    expect(t.host.runTrigger).toHaveBeenCalledWith("search");
  });
});

describe("updateSettingCommand", () => {
  it("sets a profile override", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await updateSettingCommand(t.ctx, "1 ➣ scope ➣ 3");

    expect(t.commits[0].profiles["1"].scope).toBe(3);
    expect(t.output).toEqual(["search scope set to folders and files"]);
  });

  it("removes a profile override with 0", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await updateSettingCommand(t.ctx, "1 ➣ min ➣ 0");

    expect(t.commits[0].profiles["1"]).toEqual({
      keyword: "dev",
      dirpath: "/Users/test/Code",
      excludes: [],
    });
    expect(t.output).toEqual(["minimum query length set to default"]);
  });

  it("updates the defaults under profile 0", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await updateSettingCommand(t.ctx, "0 ➣ min ➣ 4");

    expect(t.commits[0].defaults.min).toBe(4);
    expect(t.output).toEqual(["minimum query length set to 4"]);
  });

  it("reports unknown settings, profiles and bad values without saving", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await updateSettingCommand(t.ctx, "1 ➣ colour ➣ 1");
    await updateSettingCommand(t.ctx, "9 ➣ min ➣ 2");
    await updateSettingCommand(t.ctx, "1 ➣ min ➣ -1");

    expect(t.output).toEqual([
      "Unknown setting : colour",
      "No such keyword / Fuzzy Folder",
      "Invalid value for min : -1",
    ]);
    expect(t.commits).toEqual([]);
  });
});

describe("loadSettingsCommand", () => {
  it("opens the settings editor for the profile", async () => {
    const t = createTestContext({ settings: SETTINGS });

    await loadSettingsCommand(t.ctx, "1");

    expect(t.host.runTrigger).toHaveBeenCalledWith("set", "1");
  });
});
