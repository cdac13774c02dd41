import { HTMLElement, type Node as NHPNode } from "node-html-parser";

/**
 * Collects the fragment names referenced by in-page links (`<a href="#name">`).
 *
 * Every element is visited, including subtrees the renderer later skips, so the
 * result only depends on the document.
 */
export function collectFragmentTargets(root: NHPNode): Set<string> {
  const targets = new Set<string>();
  const pending: NHPNode[] = [root];

  while (pending.length > 0) {
    const node = pending.pop();
    if (!(node instanceof HTMLElement)) continue;

    if (node.rawTagName && node.rawTagName.toLowerCase() === "a") {
      const href = node.getAttribute("href");
      if (href && href.startsWith("#") && href.length > 1) {
        targets.add(href.slice(1));
      }
    }

    pending.push(...node.childNodes);
  }

  return targets;
}
