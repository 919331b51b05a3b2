import test from "node:test";
import assert from "node:assert/strict";
import { RuntimeState } from "../src/runtime-state";

test("runtime state records catalog size and selections", () => {
  const runtime = new RuntimeState();
  runtime.catalogLoaded({
    supportive_gentle: 3,
    hopeful_uplifting: 1,
    tense_to_calm: 0,
    reflective_emotional: 2,
    energetic_motivating: 0
  });
  runtime.trackSelected("req-1", "supportive_gentle", "gentle-a");
  runtime.trackSelected("req-2", "supportive_gentle", "gentle-b");

  const snap = runtime.snapshot();
  assert.equal(snap.tracksLoaded, 6);
  assert.equal(snap.tracksByMood.reflective_emotional, 2);
  assert.equal(snap.stats.selectionsByMood.supportive_gentle, 2);
  assert.equal(snap.recentEvents[0].event, "track.selected");
  assert.deepEqual(snap.recentEvents[0].payload, { requestId: "req-2", mood: "supportive_gentle", trackId: "gentle-b" });
});

test("runtime state counts failures by code", () => {
  const runtime = new RuntimeState();
  runtime.mixFailed("req-1", "NoMatchingTrack", "none");
  runtime.mixFailed("req-2", "NoMatchingTrack", "none");
  runtime.mixFailed("req-3", "InvalidDuration", "too short");

  const snap = runtime.snapshot();
  assert.deepEqual(snap.stats.failuresByCode, { NoMatchingTrack: 2, InvalidDuration: 1 });
  assert.equal(snap.recentErrors.length, 3);
  assert.equal(snap.recentErrors[0].code, "InvalidDuration");
});

test("runtime state notifies subscribers until they unsubscribe", () => {
  const runtime = new RuntimeState();
  const seen: string[] = [];
  const unsubscribe = runtime.subscribe((event) => seen.push(event.event));
  runtime.mixRendered("req-1", "/tmp/a.wav");
  unsubscribe();
  runtime.mixRendered("req-2", "/tmp/b.wav");

  assert.deepEqual(seen, ["mix.rendered"]);
  assert.equal(runtime.snapshot().stats.mixesRendered, 2);
});

test("snapshots are detached copies", () => {
  const runtime = new RuntimeState();
  const snap = runtime.snapshot();
  snap.stats.mixesRendered = 99;
  assert.equal(runtime.snapshot().stats.mixesRendered, 0);
});

test("runtime state event history is bounded", () => {
  const runtime = new RuntimeState();

  for (let i = 0; i < 250; i += 1) {
    runtime.trackSelected(`req-${i}`, "tense_to_calm", "calm-a");
  }

  const snap = runtime.snapshot();
  assert.equal(snap.recentEvents.length, 200);
  assert.equal(snap.stats.selectionsByMood.tense_to_calm, 250);
});
