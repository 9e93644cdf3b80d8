import type { EndpointProperty, Resource, ValueProvider, ValueResolver } from "@apphost/sdk";
import { AppHostError } from "./types.js";

export type PlaceholderProperty = EndpointProperty | "value";

export type TemplateSegment =
  | { kind: "literal"; text: string }
  | { kind: "placeholder"; raw: string; target: string; property: PlaceholderProperty };

const PLACEHOLDER_REGEX = /^([A-Za-z][A-Za-z0-9_-]*)\.([A-Za-z]+)$/;
const PLACEHOLDER_PROPERTIES: readonly PlaceholderProperty[] = [
  "scheme",
  "host",
  "port",
  "url",
  "targetPort",
  "value",
];

function isPlaceholderProperty(value: string): value is PlaceholderProperty {
  return PLACEHOLDER_PROPERTIES.some((property) => property === value);
}

/**
 * Splits a template into literal text and `{target.property}` placeholders.
 *
 * Braces are never literal: a stray `}` or an unterminated `{` is an error,
 * as is any braced text that is not a placeholder.
 */
export function parseTemplate(template: string, owner?: string): TemplateSegment[] {
  const segments: TemplateSegment[] = [];
  let literal = "";
  let i = 0;

  while (i < template.length) {
    const ch = template[i];
    if (ch === "}") {
      throw unresolved(`Unbalanced "}" at offset ${i} in "${template}"`, owner);
    }
    if (ch !== "{") {
      literal += ch;
      i += 1;
      continue;
    }

    const end = template.indexOf("}", i + 1);
    const nextOpen = template.indexOf("{", i + 1);
    if (end === -1 || (nextOpen !== -1 && nextOpen < end)) {
      throw unresolved(`Unterminated "{" at offset ${i} in "${template}"`, owner);
    }

    const raw = template.slice(i + 1, end);
    const match = PLACEHOLDER_REGEX.exec(raw);
    const property = match?.[2];
    if (!match || property === undefined || !isPlaceholderProperty(property)) {
      throw unresolved(`Invalid placeholder "{${raw}}" in "${template}"`, owner);
    }
    if (literal) {
      segments.push({ kind: "literal", text: literal });
      literal = "";
    }
    segments.push({
      kind: "placeholder",
      raw,
      target: match[1],
      property,
    });
    i = end + 1;
  }

  if (literal) {
    segments.push({ kind: "literal", text: literal });
  }
  return segments;
}

/**
 * Single pass: resolved values are appended as-is and never rescanned, so a
 * value that itself contains braces (a publish placeholder) stays intact.
 */
export async function renderTemplate(
  segments: readonly TemplateSegment[],
  resolvePlaceholder: (
    placeholder: Extract<TemplateSegment, { kind: "placeholder" }>,
  ) => string | Promise<string>,
): Promise<string> {
  let output = "";
  for (const segment of segments) {
    output += segment.kind === "literal" ? segment.text : await resolvePlaceholder(segment);
  }
  return output;
}

export function unresolved(message: string, resource?: string): AppHostError {
  return new AppHostError("ERR_UNRESOLVED_PLACEHOLDER", message, { resource });
}

/**
 * Template evaluated against the endpoints of `owner` and the parameters of
 * the model, e.g. `Endpoint={http.url};Key={api-key.value}`.
 */
export class ReferenceExpression implements ValueProvider {
  constructor(
    readonly owner: Resource,
    readonly template: string,
  ) {}

  async resolve(resolver: ValueResolver): Promise<string> {
    return resolver.template(this.template, this.owner);
  }
}

export class ConnectionStringReference implements ValueProvider {
  constructor(
    readonly resource: Resource,
    readonly endpointName?: string,
  ) {}

  async resolve(resolver: ValueResolver): Promise<string> {
    return resolver.connectionString(this.resource, this.endpointName);
  }
}
