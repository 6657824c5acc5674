import { quickHash, quickHashText } from "../hash";

test("FNV-1a of text matches reference values", () => {
  expect(quickHashText("")).toBe("811c9dc5");
  expect(quickHashText("a")).toBe("e40c292c");
  expect(quickHashText("hello")).toBe("4f9f2cab");
});

test("hashing bytes and text agree", () => {
  const bytes = new TextEncoder().encode("foobar");
  expect(quickHash(bytes).toString(16)).toBe("bf9cf968");
  expect(quickHashText("foobar")).toBe("bf9cf968");
});
