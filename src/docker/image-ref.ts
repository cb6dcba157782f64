export interface ImageRef {
  /** Registry host, or null for Docker Hub. */
  registry: string | null;
  /** Repository path without registry, e.g. "fluree/server". */
  repository: string;
  tag: string;
  digest: string | null;
}

/**
 * Parse an image reference of the form `[registry/]repository[:tag][@digest]`.
 * The tag defaults to "latest". A first path segment containing "." or ":" (or
 * equal to "localhost") is treated as the registry host.
 */
export function parseImageRef(image: string): ImageRef {
  let rest = image.trim();

  let digest: string | null = null;
  const atIdx = rest.indexOf("@");
  if (atIdx !== -1) {
    digest = rest.substring(atIdx + 1);
    rest = rest.substring(0, atIdx);
  }

  let registry: string | null = null;
  const slashIdx = rest.indexOf("/");
  if (slashIdx !== -1) {
    const first = rest.substring(0, slashIdx);
    if (first.includes(".") || first.includes(":") || first === "localhost") {
      registry = first;
      rest = rest.substring(slashIdx + 1);
    }
  }

  // A colon after the last slash separates the tag; earlier colons belong to a registry port.
  let tag = "latest";
  const colonIdx = rest.lastIndexOf(":");
  if (colonIdx > rest.lastIndexOf("/")) {
    tag = rest.substring(colonIdx + 1);
    rest = rest.substring(0, colonIdx);
  }

  return { registry, repository: rest, tag, digest };
}

export function formatImageRef(ref: ImageRef): string {
  const base = ref.registry ? `${ref.registry}/${ref.repository}` : ref.repository;
  return `${base}:${ref.tag}${ref.digest ? `@${ref.digest}` : ""}`;
}

/** Whether an image reference belongs to the given repository, ignoring tag and digest. */
export function isSameRepository(image: string, repository: string): boolean {
  const a = parseImageRef(image);
  const b = parseImageRef(repository);
  return a.registry === b.registry && a.repository === b.repository;
}
