/** Semantic version read from a release or tag name such as `v1.4.2-rc.1`. */
export type ParsedVersion = {
  major: number;
  minor: number;
  patch: number;
  prerelease: string | null;
};

export type VersionChange = "major" | "minor" | "patch" | "prerelease" | "none";

export type VersionDirection = "upgrade" | "downgrade" | "same";

const VERSION_PATTERN = /^(?:(?!v\d)[A-Za-z][\w.-]*?[-_/@])?v?(\d+)(?:\.(\d+))?(?:\.(\d+))?(?:-([0-9A-Za-z.-]+))?(?:\+[0-9A-Za-z.-]+)?$/;

/**
 * Reads `MAJOR[.MINOR[.PATCH]][-PRERELEASE]` with an optional `v` and an
 * optional package prefix (`pkg@1.2.0`, `release-2.0`). Missing components
 * read as zero; anything else yields `null`.
 */
export function parseVersion(name: string): ParsedVersion | null {
  const match = VERSION_PATTERN.exec(name.trim());
  if (!match) {
    return null;
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2] ?? 0),
    patch: Number(match[3] ?? 0),
    prerelease: match[4] ?? null,
  };
}

function comparePrerelease(left: string | null, right: string | null): number {
  if (left === right) {
    return 0;
  }
  // A release outranks every pre-release of the same core version.
  if (left === null) {
    return 1;
  }
  if (right === null) {
    return -1;
  }
  const leftParts = left.split(".");
  const rightParts = right.split(".");
  for (let index = 0; index < Math.max(leftParts.length, rightParts.length); index += 1) {
    const a = leftParts[index];
    const b = rightParts[index];
    if (a === undefined) {
      return -1;
    }
    if (b === undefined) {
      return 1;
    }
    const numericA = /^\d+$/.test(a);
    const numericB = /^\d+$/.test(b);
    if (numericA && numericB) {
      const delta = Number(a) - Number(b);
      if (delta !== 0) {
        return Math.sign(delta);
      }
    } else if (numericA !== numericB) {
      return numericA ? -1 : 1;
    } else if (a !== b) {
      return a < b ? -1 : 1;
    }
  }
  return 0;
}

/** Semantic-version ordering: negative when `left` precedes `right`. */
export function compareVersions(left: ParsedVersion, right: ParsedVersion): number {
  return (
    Math.sign(left.major - right.major) ||
    Math.sign(left.minor - right.minor) ||
    Math.sign(left.patch - right.patch) ||
    comparePrerelease(left.prerelease, right.prerelease)
  );
}

/** Largest component that differs between two versions. */
export function classifyVersionChange(from: ParsedVersion, to: ParsedVersion): VersionChange {
  if (from.major !== to.major) {
    return "major";
  }
  if (from.minor !== to.minor) {
    return "minor";
  }
  if (from.patch !== to.patch) {
    return "patch";
  }
  return from.prerelease === to.prerelease ? "none" : "prerelease";
}

export function versionDirection(from: ParsedVersion, to: ParsedVersion): VersionDirection {
  const order = compareVersions(from, to);
  if (order === 0) {
    return "same";
  }
  return order < 0 ? "upgrade" : "downgrade";
}
