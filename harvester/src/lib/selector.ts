import { load, type Cheerio, type CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";
import { SelectorChain } from "../types";

/** Anything that can answer "which descendants of this node match this selector". */
export interface QueryableTree<TNode> {
  select(root: TNode, selector: string): TNode[];
}

export interface Resolution<TNode> {
  fragments: TNode[];
  /** The selector that produced `fragments`; undefined when every strategy came back empty. */
  matchedSelector?: string;
  tried: string[];
  invalidSelectors: string[];
}

/**
 * Tries the primary selector, then each alternative in listed order, and stops at the
 * first strategy that yields at least one fragment. An empty result is a normal outcome.
 */
export class SelectorResolver<TNode> {
  constructor(private readonly tree: QueryableTree<TNode>) {}

  resolve(root: TNode, primary: string, alternatives: readonly string[] = []): TNode[] {
    return this.resolveDetailed(root, primary, alternatives).fragments;
  }

  resolveChain(root: TNode, chain: SelectorChain): Resolution<TNode> {
    return this.resolveDetailed(root, chain.primary, chain.alternatives);
  }

  first(root: TNode, chain: SelectorChain): TNode | undefined {
    return this.resolveChain(root, chain).fragments[0];
  }

  resolveDetailed(root: TNode, primary: string, alternatives: readonly string[] = []): Resolution<TNode> {
    const tried: string[] = [];
    const invalidSelectors: string[] = [];

    for (const selector of [primary, ...alternatives]) {
      tried.push(selector);
      let fragments: TNode[];
      try {
        fragments = this.tree.select(root, selector);
      } catch {
        invalidSelectors.push(selector);
        continue;
      }
      if (fragments.length > 0) {
        return { fragments, matchedSelector: selector, tried, invalidSelectors };
      }
    }

    return { fragments: [], tried, invalidSelectors };
  }
}

export type HtmlFragment = Cheerio<AnyNode>;

export class CheerioTree implements QueryableTree<HtmlFragment> {
  constructor(private readonly $: CheerioAPI) {}

  select(root: HtmlFragment, selector: string): HtmlFragment[] {
    return root
      .find(selector)
      .toArray()
      .map((node: AnyNode) => this.$(node));
  }

  text(fragment: HtmlFragment): string | undefined {
    const value = fragment.text().replace(/\s+/g, " ").trim();
    return value.length > 0 ? value : undefined;
  }

  attr(fragment: HtmlFragment, name: string): string | undefined {
    const value = fragment.attr(name)?.trim();
    return value && value.length > 0 ? value : undefined;
  }
}

export interface ParsedDocument {
  tree: CheerioTree;
  resolver: SelectorResolver<HtmlFragment>;
  root: HtmlFragment;
}

export function parseHtml(html: string): ParsedDocument {
  const $ = load(html);
  const tree = new CheerioTree($);
  return { tree, resolver: new SelectorResolver(tree), root: $.root() };
}
