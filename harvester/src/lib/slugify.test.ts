import assert from "node:assert/strict";
import test from "node:test";
import { slugifyText } from "./slugify";

test("slugifyText collapses punctuation and spaces into single dashes", () => {
  assert.equal(slugifyText("Daraz.pk"), "daraz-pk");
  assert.equal(slugifyText("  foodpanda.pk (Lahore) "), "foodpanda-pk-lahore");
  assert.equal(slugifyText("--Al-Fatah  Store--"), "al-fatah-store");
});
