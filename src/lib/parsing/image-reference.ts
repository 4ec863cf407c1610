/**
 * Image reference parsing shared by the dependency scanner and the catalog
 */

export interface ImageReference {
  /** Repository including any registry host and port */
  image: string;
  /** Tag, `latest` when the reference carries none */
  tag: string;
  /** `sha256:...` when pinned */
  digest?: string;
}

/**
 * Parses a Docker image string into its components
 * Handles formats:
 * - image
 * - image:tag
 * - registry:port/namespace/image:tag
 * - image:tag@sha256:digest
 *
 * A colon only separates a tag when it follows the last slash, so a registry
 * port is never mistaken for one.
 */
export function parseImageReference(reference: string): ImageReference {
  let base = reference;
  let digest: string | undefined;

  const digestAt = reference.indexOf('@sha256:');
  if (digestAt !== -1) {
    base = reference.slice(0, digestAt);
    digest = reference.slice(digestAt + 1);
  }

  const lastSlash = base.lastIndexOf('/');
  const lastColon = base.lastIndexOf(':');
  const hasTag = lastColon > lastSlash;

  const parsed: ImageReference = {
    image: hasTag ? base.slice(0, lastColon) : base,
    tag: hasTag ? base.slice(lastColon + 1) : 'latest',
  };
  if (digest !== undefined) parsed.digest = digest;
  return parsed;
}
