/**
 * Visible text of a node whose content may be projected through `<slot>`
 * elements. Shipped into the page by the renderer, so it must not reference
 * anything outside its own body.
 */
export function getDistributedText(node: Node | null): string {
  const ELEMENT_NODE = 1;
  const TEXT_NODE = 3;

  const isElement = (value: Node): value is Element => value.nodeType === ELEMENT_NODE;
  const isSlot = (value: Node): value is HTMLSlotElement =>
    isElement(value) && value.tagName.toLowerCase() === "slot";

  const textOf = (current: Node | null): string => {
    if (!current) return "";
    if (current.nodeType === TEXT_NODE) return current.textContent ?? "";
    if (isSlot(current)) {
      return current.assignedNodes({ flatten: true }).map(textOf).join(" ");
    }
    if (isElement(current)) {
      const slot = current.querySelector("slot");
      if (slot) {
        const assigned = slot.assignedNodes({ flatten: true });
        if (assigned.length) return assigned.map(textOf).join(" ");
      }
    }
    return Array.from(current.childNodes).map(textOf).join(" ");
  };

  return textOf(node).replace(/\s+/g, " ").trim();
}
