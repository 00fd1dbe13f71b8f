import type {
  EnrichmentDomain,
  EnrichmentExample,
  EnrichmentFields,
  EnrichmentRecord,
} from "@shared/enrichment";

export type RequiredField = "translation" | "phonetic" | "readings";
type ExampleField = keyof EnrichmentExample;

export interface DomainSchema {
  domain: EnrichmentDomain;
  requiredFields: RequiredField[];
  minExamples: number;
  exampleFields: ExampleField[];
  /** Label used for `text` in issue strings ("sentence" or "word"). */
  exampleTextLabel: string;
}

export const DOMAIN_SCHEMAS: Record<EnrichmentDomain, DomainSchema> = {
  lexical: {
    domain: "lexical",
    requiredFields: ["translation"],
    minExamples: 2,
    exampleFields: ["text", "translation"],
    exampleTextLabel: "sentence",
  },
  kanji: {
    domain: "kanji",
    requiredFields: ["translation", "readings"],
    minExamples: 2,
    exampleFields: ["text", "reading", "translation"],
    exampleTextLabel: "word",
  },
};

export function resolveDomainSchema(
  domain: EnrichmentDomain,
  extraRequired: readonly RequiredField[] = [],
): DomainSchema {
  const base = DOMAIN_SCHEMAS[domain];
  if (!extraRequired.length) {
    return base;
  }
  const requiredFields = Array.from(new Set([...base.requiredFields, ...extraRequired]));
  return { ...base, requiredFields } satisfies DomainSchema;
}

function hasText(value: string | undefined): boolean {
  return typeof value === "string" && value.trim().length > 0;
}

function hasRequiredField(fields: EnrichmentFields, field: RequiredField): boolean {
  switch (field) {
    case "readings":
      return hasText(fields.onyomi) || hasText(fields.kunyomi);
    case "translation":
      return hasText(fields.translation);
    case "phonetic":
      return hasText(fields.phonetic);
  }
}

function describeRequiredField(field: RequiredField): string {
  return field === "readings" ? "readings (onyomi/kunyomi)" : `'${field}'`;
}

function exampleFieldLabel(schema: DomainSchema, field: ExampleField): string {
  return field === "text" ? schema.exampleTextLabel : field;
}

export function validateRecord(record: EnrichmentRecord, schema: DomainSchema): string[] {
  const issues: string[] = [];
  const identifier = record.id;
  const { fields } = record;

  for (const field of schema.requiredFields) {
    if (!hasRequiredField(fields, field)) {
      issues.push(`Missing ${describeRequiredField(field)} for: ${identifier}`);
    }
  }

  const { examples } = fields;
  if (!examples.length) {
    if (schema.minExamples > 0) {
      issues.push(`No examples for: ${identifier}`);
    }
  } else if (examples.length < schema.minExamples) {
    issues.push(
      `Less than ${schema.minExamples} examples for: ${identifier} (has ${examples.length})`,
    );
  }

  examples.forEach((example, index) => {
    for (const field of schema.exampleFields) {
      if (!hasText(example[field])) {
        issues.push(
          `Example ${index + 1} missing '${exampleFieldLabel(schema, field)}' for: ${identifier}`,
        );
      }
    }
  });

  return issues;
}

export interface RecordValidationResult {
  record: EnrichmentRecord;
  issues: string[];
}

export function collectValidationIssues(
  records: readonly EnrichmentRecord[],
  schema: DomainSchema,
): RecordValidationResult[] {
  const results: RecordValidationResult[] = [];
  for (const record of records) {
    const issues = validateRecord(record, schema);
    if (issues.length) {
      results.push({ record, issues });
    }
  }
  return results;
}
