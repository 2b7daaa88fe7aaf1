/**
 * Per-site configuration. Site quirks are data here, consumed by one generic
 * normalizer; there is no per-site code.
 */
import { z } from "zod";
import { ConfigError, type ConfigIssue } from "./errors";

const FIELD_TYPES = [
  "text",
  "integer",
  "float",
  "money_usd",
  "money_brl",
  "url",
  "url_list",
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export interface FieldRule {
  /** Canonical field name */
  name: string;
  /** Raw field name produced by extraction */
  source: string;
  type: FieldType;
}

export interface ComputedField {
  name: string;
  /** Operands added together; absent when the first one is absent */
  sum: readonly string[];
}

export interface CssFieldRule {
  name: string;
  selector: string;
  type: "text" | "attribute";
  attribute?: string;
  multiple: boolean;
}

export interface CssExtraction {
  baseSelector: string;
  fields: CssFieldRule[];
}

export interface SiteConfig {
  readonly name: string;
  readonly enabled: boolean;
  readonly siteOrigin: string;
  readonly baseUrlOverride?: string;
  /** Base for relative URLs: the override when present, else the site origin */
  readonly baseUrl: string;
  readonly primaryUrlField: string;
  readonly fields: readonly FieldRule[];
  readonly computed: readonly ComputedField[];
  readonly trackedFields: readonly string[];
  readonly extraction?: CssExtraction;
}

/** Field mapping for the extraction JSON emitted by the property crawlers */
export const DEFAULT_FIELD_RULES: FieldRule[] = [
  { name: "url", source: "property_url", type: "url" },
  { name: "images", source: "image_urls", type: "url_list" },
  { name: "additionalImages", source: "additional_images", type: "url_list" },
  { name: "city", source: "city", type: "text" },
  { name: "neighborhood", source: "neighborhood", type: "text" },
  { name: "address", source: "full_address", type: "text" },
  { name: "description", source: "description", type: "text" },
  { name: "bedrooms", source: "bedrooms", type: "integer" },
  { name: "bathrooms", source: "bathrooms", type: "integer" },
  { name: "parkingSpaces", source: "garages", type: "integer" },
  { name: "areaSqm", source: "area_sqft", type: "float" },
  { name: "rentPrice", source: "rent_price_brl", type: "money_brl" },
  { name: "condoFee", source: "condo_fee_brl", type: "money_brl" },
];

const DEFAULT_COMPUTED_FIELDS: ComputedField[] = [
  { name: "totalPrice", sum: ["rentPrice", "condoFee"] },
];

const DEFAULT_TRACKED_FIELDS = ["rentPrice", "condoFee", "totalPrice"];

/** Default computed fields whose operands the mapping actually provides */
function applicableComputed(fieldNames: Set<string>): ComputedField[] {
  return DEFAULT_COMPUTED_FIELDS.filter((c) =>
    c.sum.every((operand) => fieldNames.has(operand))
  );
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (
      (url.protocol === "http:" || url.protocol === "https:") &&
      url.hostname.length > 0
    );
  } catch {
    return false;
  }
}

const httpUrl = z
  .string()
  .trim()
  .refine(isHttpUrl, { message: "must be an absolute http(s) URL" });

const fieldRuleSchema = z.object({
  name: z.string().min(1),
  source: z.string().min(1).optional(),
  type: z.enum(FIELD_TYPES),
});

const cssFieldSchema = z
  .object({
    name: z.string().min(1),
    selector: z.string().min(1),
    type: z.enum(["text", "attribute"]).default("text"),
    attribute: z.string().min(1).optional(),
    multiple: z.boolean().default(false),
  })
  .refine((f) => f.type !== "attribute" || f.attribute !== undefined, {
    message: "attribute is required when type is 'attribute'",
    path: ["attribute"],
  });

const siteConfigSchema = z
  .object({
    name: z.string().min(1),
    enabled: z.boolean().default(true),
    siteOrigin: httpUrl,
    baseUrlOverride: httpUrl.optional(),
    primaryUrlField: z.string().min(1).default("url"),
    fields: z.array(fieldRuleSchema).min(1).optional(),
    computed: z
      .array(z.object({ name: z.string().min(1), sum: z.array(z.string().min(1)).min(1) }))
      .optional(),
    trackedFields: z.array(z.string().min(1)).optional(),
    extraction: z
      .object({
        baseSelector: z.string().min(1),
        fields: z.array(cssFieldSchema).min(1),
      })
      .optional(),
  })
  .superRefine((cfg, ctx) => {
    const fields: Array<{ name: string; type: FieldType }> =
      cfg.fields ?? DEFAULT_FIELD_RULES;
    const known = new Set<string>();

    fields.forEach((f, i) => {
      if (known.has(f.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate field "${f.name}"`,
          path: ["fields", i, "name"],
        });
      }
      known.add(f.name);
    });

    const primary = fields.find((f) => f.name === cfg.primaryUrlField);
    if (!primary || primary.type !== "url") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `"${cfg.primaryUrlField}" must name a field of type "url"`,
        path: ["primaryUrlField"],
      });
    }

    const computed = cfg.computed ?? applicableComputed(new Set(known));
    computed.forEach((c, i) => {
      c.sum.forEach((operand, j) => {
        if (!known.has(operand)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `unknown field "${operand}"`,
            path: ["computed", i, "sum", j],
          });
        }
      });
      if (known.has(c.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate field "${c.name}"`,
          path: ["computed", i, "name"],
        });
      }
      known.add(c.name);
    });

    if (cfg.trackedFields) {
      cfg.trackedFields.forEach((t, i) => {
        if (!known.has(t)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `unknown field "${t}"`,
            path: ["trackedFields", i],
          });
        }
      });
    }
  });

function toIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function siteNameOf(input: unknown): string {
  if (input !== null && typeof input === "object" && "name" in input) {
    const name = input.name;
    if (typeof name === "string" && name.length > 0) return name;
  }
  return "<unnamed>";
}

/**
 * Validate raw configuration values and build a frozen SiteConfig.
 * The base URL is derived here once; a malformed override fails now, not
 * while records are being processed.
 */
export function createSiteConfig(input: unknown): SiteConfig {
  const parsed = siteConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(siteNameOf(input), toIssues(parsed.error));
  }
  const cfg = parsed.data;

  const rules: Array<{ name: string; source?: string; type: FieldType }> =
    cfg.fields ?? DEFAULT_FIELD_RULES;
  const fields = rules.map((f) =>
    Object.freeze({ name: f.name, source: f.source ?? f.name, type: f.type })
  );
  const computedRules: ComputedField[] =
    cfg.computed ?? applicableComputed(new Set(fields.map((f) => f.name)));
  const computed = computedRules.map((c) =>
    Object.freeze({ name: c.name, sum: Object.freeze([...c.sum]) })
  );
  // A custom mapping keeps only the default tracked fields it actually has.
  const known = new Set([...fields, ...computed].map((f) => f.name));
  const trackedFields =
    cfg.trackedFields ?? DEFAULT_TRACKED_FIELDS.filter((t) => known.has(t));

  const siteOrigin = new URL(cfg.siteOrigin).origin;

  return Object.freeze({
    name: cfg.name,
    enabled: cfg.enabled,
    siteOrigin,
    baseUrlOverride: cfg.baseUrlOverride,
    baseUrl: cfg.baseUrlOverride ?? siteOrigin,
    primaryUrlField: cfg.primaryUrlField,
    fields: Object.freeze(fields),
    computed: Object.freeze(computed),
    trackedFields: Object.freeze([...trackedFields]),
    extraction: cfg.extraction,
  });
}
