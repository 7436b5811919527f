import { describe, it, expect, vi } from "vitest";
import {
  buildMdfindQuery,
  buildMdfindArgs,
  parseIndexerOutput,
  createMdfindIndexer,
} from "./mdfind.js";
import { IndexerFailureError } from "../errors/catalog.js";
import { SCOPE_ALL, SCOPE_FILES, SCOPE_FOLDERS } from "../schemas/settings.js";

describe("buildMdfindQuery", () => {
  it("restricts to folders", () => {
    expect(buildMdfindQuery("app", SCOPE_FOLDERS)).toBe(
      "(kMDItemFSName == '*app*'c) && (kMDItemContentType == 'public.folder')",
    );
  });

  it("restricts to files", () => {
    expect(buildMdfindQuery("app", SCOPE_FILES)).toBe(
      "(kMDItemFSName == '*app*'c) && (kMDItemContentType != 'public.folder')",
    );
  });

  it("is unrestricted for folders and files", () => {
    expect(buildMdfindQuery("app", SCOPE_ALL)).toBe("(kMDItemFSName == '*app*'c)");
  });

  it("escapes quotes in the filename", () => {
    expect(buildMdfindQuery("bob's", SCOPE_ALL)).toBe(
      "(kMDItemFSName == '*bob\\'s*'c)",
    );
  });
});

describe("buildMdfindArgs", () => {
  it("limits the search to the root", () => {
    expect(
      buildMdfindArgs({ root: "/Users/test/Code", query: "app", scope: SCOPE_ALL }),
    ).toEqual(["-onlyin", "/Users/test/Code", "(kMDItemFSName == '*app*'c)"]);
  });
});

describe("parseIndexerOutput", () => {
  it("drops blank lines and surrounding whitespace", () => {
    expect(parseIndexerOutput("/a/b\n\n  /a/c \n")).toEqual(["/a/b", "/a/c"]);
  });

  it("normalizes decomposed characters", () => {
    const decomposed = "/Users/test/Cafe\u0301";
    expect(parseIndexerOutput(decomposed)).toEqual(["/Users/test/Caf\u00e9"]);
  });
});

describe("createMdfindIndexer", () => {
  it("runs mdfind and returns the paths", async () => {
    const exec = vi.fn().mockResolvedValue({
      stdout: "/Users/test/Code/app\n/Users/test/Code/web/app\n",
      stderr: "",
    });
    const indexer = createMdfindIndexer({ exec });

    const paths = await indexer.search({
      root: "/Users/test/Code",
      query: "app",
      scope: SCOPE_FOLDERS,
    });

    expect(paths).toEqual(["/Users/test/Code/app", "/Users/test/Code/web/app"]);
    expect(exec).toHaveBeenCalledWith("mdfind", [
      "-onlyin",
      "/Users/test/Code",
      "(kMDItemFSName == '*app*'c) && (kMDItemContentType == 'public.folder')",
    ]);
  });

  it("wraps failures in IndexerFailureError", async () => {
    const exec = vi.fn().mockRejectedValue(new Error("spawn mdfind ENOENT"));
    const indexer = createMdfindIndexer({ exec });

    await expect(
      indexer.search({ root: "/tmp", query: "x", scope: SCOPE_ALL }),
    ).rejects.toThrow(IndexerFailureError);
    await expect(
      indexer.search({ root: "/tmp", query: "x", scope: SCOPE_ALL }),
    ).rejects.toThrow("mdfind failed: spawn mdfind ENOENT");
  });
});
