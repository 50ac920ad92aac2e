import { ExtractionError } from "../lib/errors";
import { HtmlFragment, parseHtml } from "../lib/selector";
import { resolveListingUrl } from "../lib/url";
import { CardField, FieldSelectors, RawListing, SelectorChain } from "../types";

const DEFAULT_LINK: SelectorChain = { primary: "a[href]", alternatives: [] };
const DEFAULT_IMAGE: SelectorChain = { primary: "img", alternatives: [] };

export interface CardExtraction {
  /** Card fragments matched on the page, malformed ones included. */
  cardsFound: number;
  cardSelector?: string;
  listings: RawListing[];
  malformed: ExtractionError[];
  /** Configured selectors the engine could not parse. */
  invalidSelectors: string[];
}

interface FieldValue {
  value?: string;
  tried: string[];
}

type FieldReader = (card: HtmlFragment) => FieldValue;

/**
 * Pulls raw listings out of one page of markup. Cards missing every one of name, price
 * and url, or missing a required field, are reported as malformed and skipped.
 */
export function extractCards(
  html: string,
  pageUrl: string,
  selectors: FieldSelectors,
  requiredFields: readonly CardField[] = []
): CardExtraction {
  const { tree, resolver, root } = parseHtml(html);
  const invalid = new Set<string>();
  const resolve = (card: HtmlFragment, chain: SelectorChain): { fragment?: HtmlFragment; tried: string[] } => {
    const resolution = resolver.resolveChain(card, chain);
    resolution.invalidSelectors.forEach((selector) => invalid.add(selector));
    return { fragment: resolution.fragments[0], tried: resolution.tried };
  };

  const textReader = (chain: SelectorChain | undefined): FieldReader => {
    return (card) => {
      if (!chain) {
        return { tried: [] };
      }
      const { fragment, tried } = resolve(card, chain);
      return { value: fragment ? tree.text(fragment) : undefined, tried };
    };
  };

  const attributeReader = (chain: SelectorChain, attributes: readonly string[]): FieldReader => {
    return (card) => {
      const { fragment, tried } = resolve(card, chain);
      if (!fragment) {
        return { tried };
      }
      for (const attribute of attributes) {
        const resolved = resolveListingUrl(tree.attr(fragment, attribute), pageUrl);
        if (resolved) {
          return { value: resolved, tried };
        }
      }
      return { tried };
    };
  };

  const imageAttributes = [...new Set([selectors.image_attribute, "data-src", "src"])];
  const readers: Record<CardField, FieldReader> = {
    name: textReader(selectors.name),
    price: textReader(selectors.price),
    url: attributeReader(selectors.url ?? DEFAULT_LINK, [selectors.url_attribute]),
    image: attributeReader(selectors.image ?? DEFAULT_IMAGE, imageAttributes),
    rating: textReader(selectors.rating),
    reviews: textReader(selectors.reviews)
  };

  const cardResolution = resolver.resolveChain(root, selectors.card);
  cardResolution.invalidSelectors.forEach((selector) => invalid.add(selector));
  const listings: RawListing[] = [];
  const malformed: ExtractionError[] = [];

  for (const card of cardResolution.fragments) {
    const fields: Record<CardField, FieldValue> = {
      name: readers.name(card),
      price: readers.price(card),
      url: readers.url(card),
      image: readers.image(card),
      rating: readers.rating(card),
      reviews: readers.reviews(card)
    };

    if (!fields.name.value && !fields.price.value && !fields.url.value) {
      malformed.push(new ExtractionError("card", [...fields.name.tried, ...fields.price.tried, ...fields.url.tried]));
      continue;
    }

    const missing = requiredFields.find((field) => !fields[field].value);
    if (missing) {
      malformed.push(new ExtractionError(missing, fields[missing].tried));
      continue;
    }

    listings.push({
      ...(fields.name.value ? { name: fields.name.value } : {}),
      ...(fields.price.value ? { price_text: fields.price.value } : {}),
      ...(fields.url.value ? { product_url: fields.url.value } : {}),
      ...(fields.image.value ? { image_url: fields.image.value } : {}),
      ...(fields.rating.value ? { rating_text: fields.rating.value } : {}),
      ...(fields.reviews.value ? { reviews_text: fields.reviews.value } : {})
    });
  }

  return {
    cardsFound: cardResolution.fragments.length,
    ...(cardResolution.matchedSelector ? { cardSelector: cardResolution.matchedSelector } : {}),
    listings,
    malformed,
    invalidSelectors: [...invalid]
  };
}
