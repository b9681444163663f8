import { test } from "node:test";
import assert from "node:assert/strict";
import { applyPronunciations, numberToWords, prepareSpeechText, spellOutNumbers } from "./speechText.ts";

test("numberToWords covers 0 through 99", () => {
  assert.equal(numberToWords(0), "zero");
  assert.equal(numberToWords(7), "seven");
  assert.equal(numberToWords(13), "thirteen");
  assert.equal(numberToWords(40), "forty");
  assert.equal(numberToWords(99), "ninety-nine");
  assert.equal(numberToWords(120), "120");
});

test("spellOutNumbers leaves clock readings and decimals alone", () => {
  assert.equal(spellOutNumbers("10 seconds until gold"), "ten seconds until gold");
  assert.equal(spellOutNumbers("Fangtooth at 4:05"), "Fangtooth at 4:05");
  assert.equal(spellOutNumbers("speed 1.5 and 250 gold"), "speed 1.5 and 250 gold");
});

test("a number ending a sentence is still spelled out", () => {
  assert.equal(spellOutNumbers("Fangtooth respawns in 30."), "Fangtooth respawns in thirty.");
  assert.equal(spellOutNumbers("Wave 3. Next wave at 4:05."), "Wave three. Next wave at 4:05.");
});

test("applyPronunciations replaces whole words case-insensitively", () => {
  assert.equal(
    applyPronunciations("Orb Prime is up, orb time", { orb: "or-b" }),
    "or-b Prime is up, or-b time"
  );
  assert.equal(applyPronunciations("Orbital", { orb: "or-b" }), "Orbital");
});

test("prepareSpeechText collapses whitespace then applies both passes", () => {
  assert.equal(
    prepareSpeechText("  Gold   buffs in 10  ", { numberToWords: true, pronunciations: { buffs: "buffz" } }),
    "Gold buffz in ten"
  );
  assert.equal(prepareSpeechText("in 10", { numberToWords: false, pronunciations: {} }), "in 10");
});
