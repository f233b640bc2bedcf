import test from "node:test";
import assert from "node:assert/strict";
import { buildPoolGraph, findPlayerPools } from "../lib/pools";
import { makeGame } from "./helpers";

test("no games means no pools", () => {
  assert.deepEqual(findPlayerPools([]), []);
});

test("one game links all four players with six edges", () => {
  const graph = buildPoolGraph([makeGame(["A", "B"], ["C", "D"], 11, 3)]);

  assert.equal(graph.playerCount, 4);
  assert.equal(graph.edgeCount, 6);
  assert.deepEqual(graph.components(), [["A", "B", "C", "D"]]);
});

test("two game sets with no shared player form two pools", () => {
  const games = [
    makeGame(["A", "B"], ["C", "D"], 11, 3),
    makeGame(["H", "G"], ["F", "E"], 11, 8)
  ];

  assert.deepEqual(findPlayerPools(games), [
    ["A", "B", "C", "D"],
    ["E", "F", "G", "H"]
  ]);
});

test("one bridging game merges the pools", () => {
  const games = [
    makeGame(["A", "B"], ["C", "D"], 11, 3),
    makeGame(["E", "F"], ["G", "H"], 11, 8),
    makeGame(["A", "E"], ["B", "F"], 9, 11)
  ];

  assert.deepEqual(findPlayerPools(games), [["A", "B", "C", "D", "E", "F", "G", "H"]]);
});

test("pools are ordered by size, largest first", () => {
  const games = [
    makeGame(["W", "X"], ["Y", "Z"], 11, 3),
    makeGame(["A", "B"], ["C", "D"], 11, 3),
    makeGame(["C", "D"], ["E", "F"], 11, 5)
  ];

  assert.deepEqual(findPlayerPools(games), [
    ["A", "B", "C", "D", "E", "F"],
    ["W", "X", "Y", "Z"]
  ]);
});

test("repeat games do not add edges", () => {
  const graph = buildPoolGraph([
    makeGame(["A", "B"], ["C", "D"], 11, 3),
    makeGame(["B", "A"], ["D", "C"], 4, 11)
  ]);

  assert.equal(graph.edgeCount, 6);
});

test("names containing separators count as distinct edges", () => {
  const graph = buildPoolGraph([makeGame(["a|b", "c"], ["a", "b|c"], 11, 5)]);

  assert.equal(graph.playerCount, 4);
  assert.equal(graph.edgeCount, 6);
});

test("forfeited games contribute no players or edges", () => {
  const graph = buildPoolGraph([
    makeGame(["A", "B"], ["DEFAULT", "DEFAULT"], 11, 0),
    makeGame(["DEFAULT", "X"], ["Y", "Z"], 0, 11)
  ]);

  assert.equal(graph.edgeCount, 0);
  assert.equal(graph.playerCount, 0);
  assert.deepEqual(graph.components(), []);
});
