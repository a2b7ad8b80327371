import { SectionMeta } from "../types/rateTables";

export interface SectionLookupOptions {
  containerSelector: string;
  headingTag: string;
}

export const DEFAULT_SECTION_LOOKUP: SectionLookupOptions = {
  containerSelector: "va-table",
  headingTag: "h3"
};

/**
 * Nearest heading before a shadow-DOM table in document order. Climbs from the
 * table to its shadow host, then to the host's container, and scans previous
 * siblings level by level towards the root. Evaluated inside the page.
 */
export function findPrecedingHeading(
  table: Element,
  options: SectionLookupOptions
): SectionMeta | null {
  const DOCUMENT_FRAGMENT_NODE = 11;
  const isShadowRoot = (value: Node): value is ShadowRoot =>
    value.nodeType === DOCUMENT_FRAGMENT_NODE && "host" in value;

  const root = table.getRootNode();
  const host = isShadowRoot(root) ? root.host : null;
  const container = host ? host.closest(options.containerSelector) : null;
  if (!container) return null;

  const headingTag = options.headingTag.toLowerCase();
  const toMeta = (heading: Element): SectionMeta => ({
    id: heading.id || "",
    text: (heading.textContent ?? "").trim()
  });

  let node: Element | null = container;
  while (node) {
    let sibling = node.previousElementSibling;
    while (sibling) {
      const headings = sibling.querySelectorAll(headingTag);
      if (headings.length) return toMeta(headings[headings.length - 1]);
      if (sibling.tagName.toLowerCase() === headingTag) return toMeta(sibling);
      sibling = sibling.previousElementSibling;
    }
    node = node.parentElement;
  }
  return null;
}
