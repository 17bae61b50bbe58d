/**
 * Registry Loader
 *
 * Turns one tenant's configuration document into a Registry.
 *
 * Accepted shapes:
 *   programs:                      # nested schema (system of record)
 *     - name: Housing
 *       description: ...
 *       keywords: [rent, housing]
 *       services:
 *         - key: Rental Assistance
 *           phone: 555-0100
 *           keywords: [...]
 *           contacts: [{ name, email, booking_link }]
 *
 *   Housing:                       # legacy flat schema, one mapping per program
 *     description: ...
 *     keywords: [rent, housing]
 *
 * Entries that cannot be read are skipped and logged. Only a document that is
 * not a mapping at all raises.
 */

import { ConfigurationError } from "../utils/errorHandler";
import { Registry, type Contact, type Program, type Service } from "./types";

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asList(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

function uniqueInOrder(values: Iterable<string>): string[] {
  return Array.from(new Set(values));
}

/**
 * Lower-cased declared keywords. A field that is not a list reads as empty;
 * non-string and empty entries are dropped.
 */
export function normalizeKeywords(value: unknown): string[] {
  return asList(value)
    .filter((keyword): keyword is string => typeof keyword === "string" && keyword.length > 0)
    .map(keyword => keyword.toLowerCase());
}

/**
 * Terms implied by a service key: "Whill Sales" -> ["whill", "sales"],
 * "Rent/Utility & Deposit" -> ["rent", "utility", "deposit"].
 */
export function deriveKeyTerms(key: string): string[] {
  return key
    .split(/[\/&\s]+/)
    .map(term => term.trim().toLowerCase())
    .filter(term => term.length > 0);
}

function parseContact(raw: unknown): Contact | null {
  if (!isRecord(raw)) return null;

  const email = asText(raw.email).trim();
  const bookingLink = asText(raw.booking_link).trim();

  return Object.freeze({
    name: asText(raw.name).trim(),
    ...(email ? { email } : {}),
    ...(bookingLink ? { booking_link: bookingLink } : {}),
  });
}

function parseService(raw: unknown, programName: string): Service | null {
  if (!isRecord(raw)) {
    console.warn(`[Registry] Skipping malformed service in program "${programName}"`);
    return null;
  }

  const key = asText(raw.key).trim();
  if (!key) {
    console.warn(`[Registry] Skipping service without a key in program "${programName}"`);
    return null;
  }

  const contacts = asList(raw.contacts)
    .map(parseContact)
    .filter((contact): contact is Contact => contact !== null);

  return Object.freeze({
    key,
    phone: asText(raw.phone).trim(),
    description: asText(raw.description),
    keywords: Object.freeze(uniqueInOrder([...normalizeKeywords(raw.keywords), ...deriveKeyTerms(key)])),
    contacts: Object.freeze(contacts),
  });
}

function parseProgram(raw: unknown, legacyName?: string): Program | null {
  if (!isRecord(raw)) return null;

  const name = asText(legacyName ?? raw.name).trim();
  if (!name) return null;

  const services = new Map<string, Service>();
  for (const entry of asList(raw.services)) {
    const service = parseService(entry, name);
    if (service) {
      services.set(service.key, service);
    }
  }

  const keywords = uniqueInOrder([
    ...normalizeKeywords(raw.keywords),
    ...Array.from(services.values()).flatMap(service => service.keywords),
  ]);

  return Object.freeze({
    name,
    description: asText(raw.description),
    keywords: Object.freeze(keywords),
    services,
  });
}

/**
 * Legacy documents are keyed by program name. Each value becomes a program
 * entry carrying that name.
 */
function legacyProgramEntries(document: RawRecord): Array<{ raw: unknown; name: string }> {
  return Object.entries(document).map(([name, raw]) => ({ raw, name }));
}

export function isLegacyDocument(document: RawRecord): boolean {
  return !("programs" in document);
}

/**
 * Build a Registry from one parsed configuration document.
 *
 * @param source - Label used in log lines and errors (usually the file name)
 * @throws ConfigurationError when the document root is not a mapping
 */
export function loadRegistry(document: unknown, source = "inline"): Registry {
  if (document === null || document === undefined) {
    return Registry.empty();
  }
  if (!isRecord(document)) {
    throw new ConfigurationError(source, "configuration root must be a mapping");
  }

  const entries = isLegacyDocument(document)
    ? legacyProgramEntries(document)
    : asList(document.programs).map(raw => ({ raw, name: undefined }));

  const programs = new Map<string, Program>();
  let skipped = 0;
  for (const entry of entries) {
    const program = parseProgram(entry.raw, entry.name);
    if (!program) {
      skipped++;
      continue;
    }
    programs.set(program.name, program);
  }

  if (skipped > 0) {
    console.warn(`[Registry] ${source}: skipped ${skipped} program entr${skipped === 1 ? "y" : "ies"} without a usable name`);
  }

  return new Registry(programs.values());
}
