import { describe, expect, it } from "vitest";

import { parseJsonResponse, parseLabeledFields, splitList } from "../src/nodes/parse.js";

describe("model response parsing", () => {
  it("reads a fenced JSON answer after a reasoning block", () => {
    const text = '<thinking>draft {not json}</thinking>\n```json\n{"ok": true, "count": 2}\n```';
    expect(parseJsonResponse(text)).toEqual({ ok: true, count: 2 });
  });

  it("reads an object surrounded by prose", () => {
    expect(parseJsonResponse('Here you go: {"a": 1} hope that helps')).toEqual({ a: 1 });
  });

  it("yields an empty object for text without a usable object", () => {
    expect(parseJsonResponse("no structure at all")).toEqual({});
    expect(parseJsonResponse("{a: 1}")).toEqual({});
    expect(parseJsonResponse("[1, 2]")).toEqual({});
  });

  it("reads labeled fields up to the next label", () => {
    const text = "ERROR_TYPE: network\nERROR_SUMMARY: DNS lookup failed\nfor every host\nAFFECTED_COMPONENTS: [gateway, resolver]";
    expect(parseLabeledFields(text, ["ERROR_TYPE", "ERROR_SUMMARY", "AFFECTED_COMPONENTS", "FILES_TO_CHECK"])).toEqual({
      error_type: "network",
      error_summary: "DNS lookup failed\nfor every host",
      affected_components: "gateway, resolver",
      files_to_check: ""
    });
  });

  it("splits comma lists and strips quotes", () => {
    expect(splitList(`"resolv.conf", 'hosts', , nsswitch.conf`)).toEqual(["resolv.conf", "hosts", "nsswitch.conf"]);
  });
});
