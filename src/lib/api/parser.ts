import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";

import {
  ApiControlResponseSchema,
  ApiStatusDocumentSchema,
  type ApiControlResponse,
  type ApiStatusDocument,
} from "@/lib/api/types";
import { ProtocolError } from "@/lib/domain/errors";

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  // Serial numbers and status vectors must stay text.
  parseTagValue: false,
  trimValues: true,
});

const ElementSchema = z.record(z.string(), z.unknown());

/** Parses the payload and returns the direct children of its root element. */
export function parseRootElement(xml: string): Record<string, unknown> {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new ProtocolError(`Malformed XML at line ${line}: ${msg}`, "MALFORMED_XML", xml);
  }

  const document = ElementSchema.safeParse(xmlParser.parse(xml));
  const roots = document.success ? Object.values(document.data) : [];
  if (roots.length !== 1) {
    throw new ProtocolError("Expected exactly one root element", "MALFORMED_XML", xml);
  }

  const root = ElementSchema.safeParse(roots[0]);
  if (!root.success) {
    throw new ProtocolError("Root element has no child fields", "MALFORMED_XML", xml);
  }
  return root.data;
}

function toProtocolError(error: z.ZodError, xml: string): ProtocolError {
  const issue = error.issues[0];
  const field = issue?.path.join(".") ?? "<root>";
  if (issue?.code === z.ZodIssueCode.invalid_type && issue.received === "undefined") {
    return new ProtocolError(`Missing required field "${field}"`, "MISSING_FIELD", xml, {
      cause: error,
    });
  }
  return new ProtocolError(
    `Invalid value for field "${field}": ${issue?.message ?? "unknown issue"}`,
    "INVALID_FIELD",
    xml,
    { cause: error },
  );
}

export function parseStatusDocument(xml: string): ApiStatusDocument {
  const result = ApiStatusDocumentSchema.safeParse(parseRootElement(xml));
  if (!result.success) {
    throw toProtocolError(result.error, xml);
  }
  return result.data;
}

export function parseControlResponse(xml: string): ApiControlResponse {
  const result = ApiControlResponseSchema.safeParse(parseRootElement(xml));
  if (!result.success) {
    throw toProtocolError(result.error, xml);
  }
  return result.data;
}
