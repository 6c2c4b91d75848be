import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { ZodType, ZodTypeDef } from "zod";
import { alleleCatalogFileSchema, drugRuleFileSchema } from "../contracts.js";
import { CatalogDefectError } from "../errors.js";
import { AlleleCatalog } from "./allele-catalog.js";
import { RuleTable } from "./rule-table.js";

export const defaultDataDir = fileURLToPath(new URL("../../data/", import.meta.url));

export type ReferenceData = {
  catalog: AlleleCatalog;
  rules: RuleTable;
  versions: { catalog: string; rules: string };
};

function readJsonFile<Output, Input>(
  filePath: string,
  source: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
): Output {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CatalogDefectError(source, [`unreadable ${filePath}: ${reason}`]);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogDefectError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function loadReferenceData(dataDir: string = defaultDataDir): ReferenceData {
  const catalogFile = readJsonFile(
    path.join(dataDir, "allele-catalog.json"),
    "allele catalog",
    alleleCatalogFileSchema,
  );
  const ruleFile = readJsonFile(
    path.join(dataDir, "drug-rules.json"),
    "drug rule table",
    drugRuleFileSchema,
  );

  const catalog = AlleleCatalog.fromRecords(catalogFile.genes);
  const rules = RuleTable.build(ruleFile.rules, catalog);
  return {
    catalog,
    rules,
    versions: { catalog: catalogFile.version, rules: ruleFile.version },
  };
}
