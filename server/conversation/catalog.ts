import { CATALOG_LIMITS } from "../config/constants";
import type { Contact, Program, Registry, Service } from "../registry";

function truncateDescription(description: string): string {
  const trimmed = description.trim();
  // Code points, so an emoji is never split into a lone surrogate.
  const chars = Array.from(trimmed);
  if (chars.length <= CATALOG_LIMITS.MAX_DESCRIPTION_CHARS) return trimmed;
  return `${chars.slice(0, CATALOG_LIMITS.MAX_DESCRIPTION_CHARS).join("")}...`;
}

export function formatContact(contact: Contact): string {
  let line = contact.name;
  if (contact.email) line += ` <${contact.email}>`;
  if (contact.booking_link) line += ` [Book: ${contact.booking_link}]`;
  return line.trim();
}

function formatService(service: Service): string {
  const contacts = service.contacts
    .slice(0, CATALOG_LIMITS.MAX_CONTACTS_PER_SERVICE)
    .map(formatContact)
    .filter(Boolean)
    .join("; ");

  let line = `    • Service: ${service.key}`;
  if (service.phone) line += ` (Phone: ${service.phone})`;
  if (contacts) line += ` — Contacts: ${contacts}`;
  return line;
}

function formatProgram(program: Program): string {
  const description = truncateDescription(program.description);
  return description
    ? `- Program: ${program.name} — ${description}`
    : `- Program: ${program.name}`;
}

/**
 * Bullet outline of a tenant's catalog for the chat system prompt. At most
 * maxServicesPerProgram services per program; a "    • ..." line marks the
 * cut so the model knows the list is partial.
 */
export function renderCatalog(
  registry: Registry,
  maxServicesPerProgram: number = CATALOG_LIMITS.MAX_SERVICES_PER_PROGRAM,
): string {
  const cap = Math.max(0, maxServicesPerProgram);
  const lines: string[] = [];

  for (const program of registry.programs()) {
    lines.push(formatProgram(program));

    const services = Array.from(program.services.values());
    for (const service of services.slice(0, cap)) {
      lines.push(formatService(service));
    }
    if (services.length > cap) {
      lines.push("    • ...");
    }
  }

  return lines.join("\n");
}
