/**
 * Tenant Configuration Source
 *
 * Reads every `<organization>.yaml` (or `.yml`) file in the organizations
 * directory and builds the TenantDirectory the rest of the server is given.
 * Files are read in name order so "first loaded" is stable across hosts.
 */

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { TENANT_CONSTANTS } from "../config/constants";
import { ConfigurationError, getErrorMessage } from "../utils/errorHandler";
import { loadRegistry } from "./loader";
import { TenantDirectory } from "./tenants";
import type { Registry } from "./types";

export type TenantDocument = {
  organization: string;
  file: string;
  document: unknown;
};

function isConfigFile(fileName: string): boolean {
  return TENANT_CONSTANTS.CONFIG_EXTENSIONS.some(ext => fileName.endsWith(ext));
}

/**
 * Parse one YAML document.
 *
 * @throws ConfigurationError when the text is not valid YAML
 */
export function parseTenantDocument(text: string, source: string): unknown {
  try {
    return parseYaml(text);
  } catch (error) {
    throw new ConfigurationError(source, `invalid YAML (${getErrorMessage(error)})`);
  }
}

export function readTenantDocuments(directory: string): TenantDocument[] {
  if (!fs.existsSync(directory)) {
    console.warn(`[Registry] Organizations directory "${directory}" not found, starting with an empty catalog`);
    return [];
  }

  return fs.readdirSync(directory)
    .filter(isConfigFile)
    .sort()
    .map(file => {
      const text = fs.readFileSync(path.join(directory, file), "utf-8");
      return {
        organization: file.slice(0, file.length - path.extname(file).length),
        file,
        document: parseTenantDocument(text, file),
      };
    });
}

export function buildTenantDirectory(documents: TenantDocument[]): TenantDirectory {
  const tenants: Array<[string, Registry]> = [];
  for (const { organization, file, document } of documents) {
    const registry = loadRegistry(document, file);
    console.log(`[Registry] Loaded ${registry.size} program(s) for "${organization}" from ${file}`);
    tenants.push([organization, registry]);
  }
  return new TenantDirectory(tenants);
}

export function loadTenantDirectory(directory: string): TenantDirectory {
  const tenants = buildTenantDirectory(readTenantDocuments(directory));
  console.log(`[Registry] Organizations available: ${tenants.organizations().join(", ")}`);
  return tenants;
}
