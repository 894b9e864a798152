/**
 * Container reader/writer.
 *
 * The container lives in one region, a direct child of the host's root element:
 *
 *   <svgpack:container xmlns:svgpack="urn:svgpack:container:1">
 *   <svgpack:metadata>{ "metadata": …, "structure": …, "changelog": … }</svgpack:metadata>
 *   <svgpack:entry path="…" media-type="…" encoding="…" checksum="…"
 *     raw-size="…" encoded-size="…" added-at="…">payload</svgpack:entry>
 *   </svgpack:container>
 *
 * Everything before and after the region is passthrough and is written back
 * byte for byte.
 */

import { TextDecoder } from 'node:util';
import { z } from 'zod';
import { ChangelogEntrySchema } from './changelog.js';
import type { Entry } from './codec.js';
import { Container, type JsonValue } from './container.js';
import { ContainerError, InvalidHostFormatError, StructureConflictError } from './errors.js';
import { DirectoryTreeNodeSchema, validateTree } from './structure.js';
import { escapeAttribute, escapeText, positionAt, scanXml, textContent, type XmlElement } from './xml.js';

export const CONTAINER_NAMESPACE = 'urn:svgpack:container:1';
export const CONTAINER_PREFIX = 'svgpack';

const REGION = `${CONTAINER_PREFIX}:container`;
const METADATA = `${CONTAINER_PREFIX}:metadata`;
const ENTRY = `${CONTAINER_PREFIX}:entry`;

/** Host used when a container is created from nothing. */
export const BLANK_HOST =
  '<?xml version="1.0" encoding="UTF-8"?>\n' +
  '<svg xmlns="http://www.w3.org/2000/svg" width="1" height="1" viewBox="0 0 1 1">\n' +
  '</svg>\n';

/**
 * Host text around the container region.
 */
export interface PassthroughFragments {
  head: string;
  tail: string;
}

export interface ParsedDocument {
  container: Container;
  fragments: PassthroughFragments;
}

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

const MetadataBlockSchema = z
  .object({
    metadata: z.record(JsonValueSchema),
    structure: DirectoryTreeNodeSchema.optional(),
    changelog: z.array(ChangelogEntrySchema).optional(),
  })
  .strict();

const ENTRY_ATTRIBUTES = ['path', 'media-type', 'encoding', 'checksum', 'raw-size', 'encoded-size', 'added-at'] as const;

function hostText(bytes: Buffer | string): string {
  if (typeof bytes === 'string') return bytes;
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch {
    throw new InvalidHostFormatError('Host document is not valid UTF-8');
  }
}

function sizeAttribute(text: string, el: XmlElement, name: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidHostFormatError(`Entry attribute ${name}="${value}" is not a size`, positionAt(text, el.start));
  }
  return Number(value);
}

function readEntry(text: string, el: XmlElement): Entry {
  const attrs: Record<string, string> = {};
  for (const name of ENTRY_ATTRIBUTES) {
    const value = el.attributes.get(name);
    if (value === undefined) {
      throw new InvalidHostFormatError(`Entry is missing the ${name} attribute`, positionAt(text, el.start));
    }
    attrs[name] = value;
  }
  return {
    path: attrs['path'],
    payload: textContent(text, el),
    encoding: attrs['encoding'],
    mediaType: attrs['media-type'],
    checksum: attrs['checksum'],
    rawSize: sizeAttribute(text, el, 'raw-size', attrs['raw-size']),
    encodedSize: sizeAttribute(text, el, 'encoded-size', attrs['encoded-size']),
    addedAt: attrs['added-at'],
  };
}

function readMetadataBlock(text: string, el: XmlElement): z.infer<typeof MetadataBlockSchema> {
  let json: unknown;
  try {
    json = JSON.parse(textContent(text, el));
  } catch (err) {
    if (err instanceof ContainerError) throw err;
    throw new InvalidHostFormatError('Metadata block is not valid JSON', positionAt(text, el.start));
  }
  const parsed = MetadataBlockSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new InvalidHostFormatError(`Metadata block is malformed: ${issues.join('; ')}`, positionAt(text, el.start));
  }
  return parsed.data;
}

/**
 * Fragments for a host with no container region: the region goes right
 * before the root's end tag. A self-closing root is opened up.
 */
function fragmentsAroundRootEnd(text: string, root: XmlElement): PassthroughFragments {
  if (root.selfClosing) {
    return {
      head: `${text.slice(0, root.closeStart)}>`,
      tail: `</${root.name}>${text.slice(root.end)}`,
    };
  }
  return { head: text.slice(0, root.closeStart), tail: text.slice(root.closeStart) };
}

/**
 * Parse a host document into a container and its passthrough fragments.
 * Payloads are not decoded here.
 */
export function parseDocument(bytes: Buffer | string, opts: { clock?: () => Date } = {}): ParsedDocument {
  const text = hostText(bytes);
  const doc = scanXml(text);

  const regions = doc.elements.filter(e => e.name === REGION);
  const metadataBlocks = doc.elements.filter(e => e.name === METADATA);
  if (regions.length > 1) {
    throw new StructureConflictError(`Host document has ${regions.length} container regions`);
  }
  if (metadataBlocks.length > 1) {
    throw new StructureConflictError(`Host document has ${metadataBlocks.length} metadata blocks`);
  }

  if (regions.length === 0) {
    const stray = doc.elements.find(e => e.name === METADATA || e.name === ENTRY);
    if (stray) {
      throw new InvalidHostFormatError(`<${stray.name}> outside a container region`, positionAt(text, stray.start));
    }
    return {
      container: new Container({ clock: opts.clock }),
      fragments: fragmentsAroundRootEnd(text, doc.root),
    };
  }

  const region = regions[0];
  if (!doc.root.children.includes(region)) {
    throw new InvalidHostFormatError('Container region must be a child of the root element', positionAt(text, region.start));
  }

  let block: z.infer<typeof MetadataBlockSchema> | undefined;
  const entries: Entry[] = [];
  for (const child of region.children) {
    if (child.name === METADATA) {
      block = readMetadataBlock(text, child);
    } else if (child.name === ENTRY) {
      entries.push(readEntry(text, child));
    } else {
      throw new InvalidHostFormatError(`Unexpected <${child.name}> in container region`, positionAt(text, child.start));
    }
  }
  if (!block) {
    throw new InvalidHostFormatError('Container region has no metadata block', positionAt(text, region.start));
  }

  const container = Container.restore({
    entries,
    metadata: block.metadata,
    preserveStructure: block.structure !== undefined,
    changelog: block.changelog,
    clock: opts.clock,
  });

  if (block.structure) validateTree(block.structure, container.paths());
  const filesCount = block.metadata['files_count'];
  if (filesCount !== container.size) {
    throw new StructureConflictError(
      `metadata.files_count is ${JSON.stringify(filesCount)} but the region holds ${container.size} entries`,
    );
  }

  return {
    container,
    fragments: { head: text.slice(0, region.start), tail: text.slice(region.end) },
  };
}

function renderEntry(entry: Entry): string {
  const attrs = [
    ['path', entry.path],
    ['media-type', entry.mediaType],
    ['encoding', entry.encoding],
    ['checksum', entry.checksum],
    ['raw-size', String(entry.rawSize)],
    ['encoded-size', String(entry.encodedSize)],
    ['added-at', entry.addedAt],
  ]
    .map(([name, value]) => `${name}="${escapeAttribute(value)}"`)
    .join(' ');
  return `<${ENTRY} ${attrs}>${escapeText(entry.payload)}</${ENTRY}>`;
}

/**
 * The container region as markup.
 */
export function renderRegion(container: Container): string {
  const block: Record<string, unknown> = { metadata: container.metadata };
  const structure = container.structure;
  if (structure) block['structure'] = structure;
  if (container.changelog.length > 0) block['changelog'] = container.changelog;

  const lines = [
    `<${REGION} xmlns:${CONTAINER_PREFIX}="${CONTAINER_NAMESPACE}">`,
    `<${METADATA}>${escapeText(JSON.stringify(block, null, 2))}</${METADATA}>`,
    ...[...container.entries.values()].map(renderEntry),
    `</${REGION}>`,
  ];
  return lines.join('\n');
}

/**
 * Serialize a container back into its host. Fragments are written verbatim.
 */
export function serializeDocument(container: Container, fragments: PassthroughFragments): Buffer {
  return Buffer.from(fragments.head + renderRegion(container) + fragments.tail, 'utf8');
}
