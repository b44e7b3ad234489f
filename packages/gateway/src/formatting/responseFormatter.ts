import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import type { ResponseFormat } from "../types";

export const MALFORMED_JSON_PLACEHOLDER = "Malformed JSON";
export const MALFORMED_XML_PREFIX = "Malformed XML";

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export const JSON_TEMPLATE = `{
  "title": "short description of the request",
  "source_request": "the original request",
  "answer": "the answer to the request"
}`;

export const XML_TEMPLATE = `${XML_DECLARATION}
<response>
  <title>short description of the request</title>
  <source_request>the original request</source_request>
  <answer>the answer to the request</answer>
</response>`;

const JSON_EXAMPLE = `{
  "title": "Location of Ancient Rome",
  "source_request": "Where was Ancient Rome",
  "answer": "Ancient Rome was located in the central part of the Italian Peninsula, in present-day Italy"
}`;

const XML_EXAMPLE = `${XML_DECLARATION}
<response>
  <title>Location of Ancient Rome</title>
  <source_request>Where was Ancient Rome</source_request>
  <answer>Ancient Rome was located in the central part of the Italian Peninsula, in present-day Italy</answer>
</response>`;

function enhanceForJson(userMessage: string): string {
  return `User request: ${userMessage}

CRITICAL: Respond ONLY with raw JSON. Your response must start with { and end with }

Required JSON format:
${JSON_TEMPLATE}

STRICT RULES:
- NO markdown code blocks (NO \`\`\`json or \`\`\`)
- NO explanatory text before or after JSON
- NO additional formatting
- Start immediately with {
- End immediately with }
- Use only the specified keys

CORRECT example (your response should look EXACTLY like this):
${JSON_EXAMPLE}

WRONG examples (DO NOT do this):
\`\`\`json
{...}
\`\`\`

or

Here is the JSON:
{...}

Your response must be pure JSON only.`;
}

function enhanceForXml(userMessage: string): string {
  return `User request: ${userMessage}

CRITICAL: Respond ONLY with valid XML. Your response must start with <?xml and end with </response>

Required XML format:
${XML_TEMPLATE}

STRICT RULES:
- NO markdown code blocks (NO \`\`\`xml or \`\`\`)
- NO explanatory text before or after XML
- NO additional formatting
- Must include XML declaration: ${XML_DECLARATION}
- Must be well-formed XML with proper opening and closing tags
- Use only the specified tags: <response>, <title>, <source_request>, <answer>

CORRECT example (your response should look EXACTLY like this):
${XML_EXAMPLE}

WRONG examples (DO NOT do this):
\`\`\`xml
<response>...</response>
\`\`\`

or

Here is the XML:
<response>...</response>

Your response must be pure XML only.`;
}

/** Rewrites the outgoing user message with instructions for the requested format. */
export function enhanceMessage(userMessage: string, format: ResponseFormat): string {
  switch (format) {
    case "plain_text":
      return userMessage;
    case "json":
      return enhanceForJson(userMessage);
    case "xml":
      return enhanceForXml(userMessage);
  }
}

/** Cleans a model reply produced under `enhanceMessage`. Never throws. */
export function processResponse(responseText: string, format: ResponseFormat): string {
  switch (format) {
    case "plain_text":
      return responseText;
    case "json":
      return processJson(responseText);
    case "xml":
      return processXml(responseText);
  }
}

export function stripCodeFence(text: string, language: string): string {
  let cleaned = text.trim();
  const fence = "```";
  if (cleaned.startsWith(fence + language)) {
    cleaned = cleaned.slice(fence.length + language.length);
  } else if (cleaned.startsWith(fence)) {
    cleaned = cleaned.slice(fence.length);
  }
  if (cleaned.endsWith(fence)) {
    cleaned = cleaned.slice(0, -fence.length);
  }
  return cleaned.trim();
}

function processJson(responseText: string): string {
  const cleaned = stripCodeFence(responseText, "json");
  try {
    return JSON.stringify(JSON.parse(cleaned), null, 2);
  } catch {
    return MALFORMED_JSON_PLACEHOLDER;
  }
}

const xmlParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  processEntities: true,
});

const xmlBuilder = new XMLBuilder({
  preserveOrder: true,
  format: true,
  indentBy: "  ",
  ignoreAttributes: false,
  attributeNamePrefix: "",
  suppressEmptyNode: true,
});

function processXml(responseText: string): string {
  const cleaned = stripCodeFence(responseText, "xml");
  const validation = XMLValidator.validate(cleaned);
  if (validation !== true) {
    return `${MALFORMED_XML_PREFIX}: ${validation.err.msg}`;
  }
  try {
    const built: string = xmlBuilder.build(xmlParser.parse(cleaned));
    return `${XML_DECLARATION}\n${built.trim()}`;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return `${MALFORMED_XML_PREFIX}: ${message}`;
  }
}
