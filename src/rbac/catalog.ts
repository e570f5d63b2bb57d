/**
 * The full test catalog and the filters that narrow a run
 */

import { AUTHORIZATION_REQUIREMENTS, AUTHORIZATION_TESTS } from "./cases/authorization.js";
import { NETWORKING_REQUIREMENTS, NETWORKING_TESTS } from "./cases/networking.js";
import type { Requirement, TestCase, TestModule } from "./types.js";
import { TEST_MODULES } from "./types.js";

export const ALL_TEST_CASES: readonly TestCase[] = [...AUTHORIZATION_TESTS, ...NETWORKING_TESTS];

export const REQUIREMENTS: readonly Requirement[] = [
  ...Object.values(AUTHORIZATION_REQUIREMENTS),
  ...Object.values(NETWORKING_REQUIREMENTS),
];

export interface TestSelection {
  modules?: TestModule[];
  testIds?: string[];
}

/**
 * Catalog order is preserved; an empty or missing filter selects everything
 */
export function selectTestCases(selection: TestSelection = {}, catalog: readonly TestCase[] = ALL_TEST_CASES): TestCase[] {
  const modules = selection.modules && selection.modules.length > 0 ? selection.modules : TEST_MODULES;
  const ids = selection.testIds && selection.testIds.length > 0
    ? new Set(selection.testIds.map(id => id.toUpperCase()))
    : undefined;

  return catalog.filter(test => modules.includes(test.module) && (!ids || ids.has(test.id)));
}

export function testCasesByModule(tests: readonly TestCase[]): Map<TestModule, TestCase[]> {
  const grouped = new Map<TestModule, TestCase[]>();
  for (const module of TEST_MODULES) {
    const inModule = tests.filter(test => test.module === module);
    if (inModule.length > 0) {
      grouped.set(module, inModule);
    }
  }
  return grouped;
}

export function findUnknownTestIds(testIds: readonly string[], catalog: readonly TestCase[] = ALL_TEST_CASES): string[] {
  const known = new Set(catalog.map(test => test.id));
  return testIds.filter(id => !known.has(id.toUpperCase()));
}

export interface CatalogEntry {
  id: string;
  module: TestModule;
  requirementId: string;
  requirementName: string;
  name: string;
  description: string;
  expectation: TestCase["expectation"];
  requires: string[];
}

export function toCatalogEntry(test: TestCase): CatalogEntry {
  return {
    id: test.id,
    module: test.module,
    requirementId: test.requirement.id,
    requirementName: test.requirement.name,
    name: test.name,
    description: test.description,
    expectation: test.expectation,
    requires: [...test.requires],
  };
}

export function renderCatalogMarkdown(tests: readonly TestCase[]): string {
  let md = `# RBAC Test Catalog\n\n${tests.length} test case(s)\n\n`;
  md += `| ID | Requirement | Name | Expectation | Requires |\n|---|---|---|---|---|\n`;
  for (const test of tests) {
    md += `| ${test.id} | ${test.requirement.id} ${test.requirement.name} | ${test.name} | ${test.expectation} | ${test.requires.join(", ") || "-"} |\n`;
  }
  return md;
}
