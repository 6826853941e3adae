import * as fs from "node:fs";
import { SpecFileError } from "../types/errors";

export interface SpecUpdate {
  version: string;
  sourceUrl: string;
  date: Date;
  packager: string;
}

const DAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

// Header values start at this column, matching the packaged spec's layout.
const HEADER_WIDTH = 16;

function headerPattern(field: string): RegExp {
  const escaped = field.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`^${escaped}:[ \\t]*(.*)$`, "m");
}

export function readSpecField(
  content: string,
  field: string,
): string | undefined {
  const m = headerPattern(field).exec(content);
  const value = m?.[1]?.trim();
  return value ? value : undefined;
}

export function readCurrentVersion(content: string): string {
  const version = readSpecField(content, "Version");
  if (!version) {
    throw new SpecFileError("Could not find Version in spec file");
  }
  return version;
}

/** rpm changelog date, e.g. `Sat May 31 2025`. */
export function formatChangelogDate(date: Date): string {
  const day = DAYS[date.getDay()];
  const month = MONTHS[date.getMonth()];
  return `${day} ${month} ${date.getDate()} ${date.getFullYear()}`;
}

function setHeader(content: string, field: string, value: string): string {
  return content.replace(
    headerPattern(field),
    () => `${`${field}:`.padEnd(HEADER_WIDTH)}${value}`,
  );
}

function setDesktopEntryVersion(content: string, version: string): string {
  const lines = content.split("\n");
  let inEntry = false;
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const trimmed = line.trim();
    if (trimmed === "[Desktop Entry]") {
      inEntry = true;
      continue;
    }
    if (!inEntry) continue;
    // the heredoc terminator or a new group closes the block
    if (trimmed === "" || trimmed === "EOF" || trimmed.startsWith("[")) {
      inEntry = false;
      continue;
    }
    if (line.startsWith("Version=")) {
      lines[i] = `Version=${version}`;
      inEntry = false;
    }
  }
  return lines.join("\n");
}

function addChangelogEntry(content: string, update: SpecUpdate): string {
  const stamp = formatChangelogDate(update.date);
  const header = `* ${stamp} ${update.packager} - ${update.version}-1`;
  const bullet = `- Update to ${update.version}`;
  const lines = content.split("\n");
  const idx = lines.findIndex((l) => l.trim() === "%changelog");
  if (idx === -1) {
    const base = content.endsWith("\n") ? content : content + "\n";
    return `${base}\n%changelog\n${header}\n${bullet}\n`;
  }
  const head = lines.slice(0, idx + 1);
  const rest = lines.slice(idx + 1);
  const first = rest.findIndex((l) => l.trim() !== "");
  if (first === -1) {
    return [...head, header, bullet, ""].join("\n");
  }
  const top = rest[first];
  if (top.startsWith("*") && top.trimEnd().endsWith(` - ${update.version}-1`)) {
    return content;
  }
  return [...head, header, bullet, "", ...rest.slice(first)].join("\n");
}

/**
 * Rewrites the version-bearing parts of a spec for a new upstream release.
 * Earlier changelog entries are kept below the new one.
 */
export function updateSpecContent(content: string, update: SpecUpdate): string {
  if (!readSpecField(content, "Version")) {
    throw new SpecFileError("Could not find Version in spec file");
  }
  if (!readSpecField(content, "Source0")) {
    throw new SpecFileError("Could not find Source0 in spec file");
  }
  let next = setHeader(content, "Version", update.version);
  if (readSpecField(next, "Release")) {
    next = setHeader(next, "Release", "1%{?dist}");
  }
  next = setHeader(next, "Source0", update.sourceUrl);
  next = setDesktopEntryVersion(next, update.version);
  return addChangelogEntry(next, update);
}

export function readSpecFile(specFile: string): string {
  try {
    return fs.readFileSync(specFile, "utf8");
  } catch (err) {
    throw new SpecFileError(
      `Error reading spec file ${specFile}: ` +
        (err instanceof Error ? err.message : String(err)),
    );
  }
}

export function applySpecUpdate(specFile: string, update: SpecUpdate): string {
  const updated = updateSpecContent(readSpecFile(specFile), update);
  fs.writeFileSync(specFile, updated);
  return updated;
}

/** `<Name>-<Version>-<Release>.src.rpm` with the dist macro expanded. */
export function expectedSrpmName(
  content: string,
  distTag: string,
): string | undefined {
  const name = readSpecField(content, "Name");
  const version = readSpecField(content, "Version");
  const release = readSpecField(content, "Release");
  if (!name || !version || !release) return undefined;
  return `${name}-${version}-${release.replace("%{?dist}", distTag)}.src.rpm`;
}
