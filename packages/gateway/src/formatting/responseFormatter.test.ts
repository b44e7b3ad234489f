import { describe, expect, it } from "vitest";
import {
  JSON_TEMPLATE,
  MALFORMED_JSON_PLACEHOLDER,
  XML_TEMPLATE,
  enhanceMessage,
  processResponse,
  stripCodeFence,
} from "./responseFormatter";

describe("enhanceMessage", () => {
  it("leaves plain text requests alone", () => {
    expect(enhanceMessage("What is 2+2?", "plain_text")).toBe("What is 2+2?");
  });

  it("wraps JSON requests with the template", () => {
    const enhanced = enhanceMessage("What is 2+2?", "json");

    expect(enhanced.startsWith("User request: What is 2+2?\n\nCRITICAL: Respond ONLY with raw JSON.")).toBe(true);
    expect(enhanced).toContain(JSON_TEMPLATE);
    expect(enhanced.endsWith("Your response must be pure JSON only.")).toBe(true);
  });

  it("wraps XML requests with the template", () => {
    const enhanced = enhanceMessage("What is 2+2?", "xml");

    expect(enhanced.startsWith("User request: What is 2+2?\n\nCRITICAL: Respond ONLY with valid XML.")).toBe(true);
    expect(enhanced).toContain(XML_TEMPLATE);
  });
});

describe("stripCodeFence", () => {
  it("removes a language fence", () => {
    expect(stripCodeFence('```json\n{"a":1}\n```', "json")).toBe('{"a":1}');
  });

  it("removes a bare fence", () => {
    expect(stripCodeFence("```\n<a/>\n```", "xml")).toBe("<a/>");
  });

  it("keeps unfenced text", () => {
    expect(stripCodeFence("  plain  ", "json")).toBe("plain");
  });
});

describe("processResponse", () => {
  it("returns plain text untouched", () => {
    expect(processResponse("  spaced  ", "plain_text")).toBe("  spaced  ");
  });

  it("parses fenced and unfenced JSON to the same document", () => {
    const payload = '{"title":"Sum","answer":"4"}';

    const fenced = processResponse("```json\n" + payload + "\n```", "json");
    const bare = processResponse(payload, "json");

    expect(fenced).toBe(bare);
    expect(bare).toBe('{\n  "title": "Sum",\n  "answer": "4"\n}');
  });

  it("replaces malformed JSON with a placeholder", () => {
    expect(processResponse('{"title": ', "json")).toBe(MALFORMED_JSON_PLACEHOLDER);
  });

  it("re-serializes fenced XML with a declaration", () => {
    const reply = "```xml\n<response><title>Sum</title><answer>A &amp; B</answer></response>\n```";

    expect(processResponse(reply, "xml")).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        "<response>",
        "  <title>Sum</title>",
        "  <answer>A &amp; B</answer>",
        "</response>",
      ].join("\n"),
    );
  });

  it("keeps attributes and self-closes empty elements", () => {
    expect(processResponse('<response id="1"><title></title><answer>x</answer></response>', "xml")).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<response id="1">',
        "  <title/>",
        "  <answer>x</answer>",
        "</response>",
      ].join("\n"),
    );
  });

  it("reports malformed XML without throwing", () => {
    const processed = processResponse("<response><title>Sum</response>", "xml");

    expect(processed.startsWith("Malformed XML: ")).toBe(true);
  });
});
