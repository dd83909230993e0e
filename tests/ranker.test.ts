import { describe, expect, it } from "vitest";
import { rank } from "../src/services/ranker.js";
import { activity, flight, hotel } from "./fixtures.js";

describe("rank flights", () => {
  it("orders by stops, then price with missing prices last", () => {
    const oneStop = flight(["BA178", "BA304"], { price: 300 });
    const direct500 = flight(["AF7"], { price: 500 });
    const directUnpriced = flight(["DL264"], { price: null });
    const direct400 = flight(["UA57"], { price: 400 });

    expect(rank("flight", [oneStop, direct500, directUnpriced, direct400])).toEqual([
      direct400,
      direct500,
      directUnpriced,
      oneStop,
    ]);
  });
});

describe("rank hotels", () => {
  const top = hotel({ name: "Top", rating: 4.5, price: 300 });
  const cheap4 = hotel({ name: "Cheap", rating: 4, price: 100 });
  const dear4 = hotel({ name: "Dear", rating: 4, price: 200 });
  const unrated = hotel({ name: "Unrated", price: 50 });
  const zero = hotel({ name: "Zero", rating: 0, price: 80 });

  it("orders by rating, then price", () => {
    expect(rank("hotel", [dear4, unrated, top, cheap4]).map((h) => h.name)).toEqual([
      "Top",
      "Cheap",
      "Dear",
      "Unrated",
    ]);
  });

  it("treats unrated as zero by default", () => {
    expect(rank("hotel", [zero, unrated]).map((h) => h.name)).toEqual(["Unrated", "Zero"]);
  });

  it("can put unrated records after every rated one", () => {
    expect(rank("hotel", [unrated, zero], { unrated: "last" }).map((h) => h.name)).toEqual([
      "Zero",
      "Unrated",
    ]);
  });

  it("keeps incoming order for ties", () => {
    const a = hotel({ name: "A", rating: 4, price: 100 });
    const b = hotel({ name: "B", rating: 4, price: 100, source: "amadeus" });
    expect(rank("hotel", [a, b])).toEqual([a, b]);
    expect(rank("hotel", [b, a])).toEqual([b, a]);
  });

  it("does not touch the input", () => {
    const input = [dear4, top];
    rank("hotel", input);
    expect(input).toEqual([dear4, top]);
  });
});

describe("rank activities", () => {
  it("uses the first number of the price range as the tie-break", () => {
    const dear = activity({ name: "Dear", rating: 4.5, price_range: "€40" });
    const cheap = activity({ name: "Cheap", rating: 4.5, price_range: "€25 per person" });
    const free = activity({ name: "Unpriced", rating: 4.5 });

    expect(rank("activity", [free, dear, cheap]).map((a) => a.name)).toEqual([
      "Cheap",
      "Dear",
      "Unpriced",
    ]);
  });
});
