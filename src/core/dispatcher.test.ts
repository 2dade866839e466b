import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import { RvmDataset } from "../rvm/dataset.js";
import { ReminderStore } from "../reminders/store.js";
import { ABC_CSV, MemoryStorage, RecordingTransport, chatEvent, command, location, makeTmpDir } from "../testing/fakes.js";
import type { FlowDeps } from "./conversation.js";
import { Dispatcher } from "./dispatcher.js";
import { GENERIC_ERROR_TEXT } from "./format.js";

type Setup = { dispatcher: Dispatcher; transport: RecordingTransport; breakIndex: (on: boolean) => void; cleanup: () => void };

function setup(): Setup {
  const dataset = new RvmDataset(new MemoryStorage(ABC_CSV));
  dataset.load();
  let broken = false;
  const flaky: FlowDeps["dataset"] = {
    nearestK: (origin, k) => {
      if (broken) throw new Error("index corrupted");
      return dataset.nearestK(origin, k);
    },
    findByQuery: (query, k) => dataset.findByQuery(query, k),
    updateStatus: (id, status, at) => dataset.updateStatus(id, status, at),
    get: (id) => dataset.get(id)
  };
  const dir = makeTmpDir("rvm-dispatcher");
  const transport = new RecordingTransport();
  const dispatcher = new Dispatcher(transport, { dataset: flaky, reminders: new ReminderStore(dir) }, { trace: false });
  return {
    dispatcher,
    transport,
    breakIndex: (on) => {
      broken = on;
    },
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true })
  };
}

test("a failing flow sends the generic error and resets the session", async () => {
  const s = setup();
  try {
    s.breakIndex(true);
    await s.dispatcher.handle(chatEvent(command("find")));
    assert.deepEqual(s.dispatcher.stateOf("u1", "u1"), { flow: "finding", awaiting: "location" });

    await s.dispatcher.handle(chatEvent(location(1.3, 103.8)));
    assert.deepEqual(s.transport.sent.at(-1), {
      text: GENERIC_ERROR_TEXT,
      markup: { kind: "remove" },
      target: { chatId: "u1" }
    });
    assert.deepEqual(s.dispatcher.stateOf("u1", "u1"), { flow: "idle" });
    assert.equal(s.dispatcher.activeSessions, 0);

    s.breakIndex(false);
    s.transport.clear();
    await s.dispatcher.handle(chatEvent(command("find")));
    await s.dispatcher.handle(chatEvent(location(1.3, 103.8)));
    assert.equal(s.transport.sent.length, 2);
    assert.match(s.transport.texts()[1], /^Here are the 3 nearest RVMs:/);
  } finally {
    s.cleanup();
  }
});

test("sessions are kept per user", async () => {
  const s = setup();
  try {
    await s.dispatcher.handle(chatEvent(command("find"), { userId: "u1" }));
    await s.dispatcher.handle(chatEvent(command("set"), { userId: "u2" }));
    assert.deepEqual(s.dispatcher.stateOf("u1", "u1"), { flow: "finding", awaiting: "location" });
    assert.deepEqual(s.dispatcher.stateOf("u2", "u2"), { flow: "settingReminder", awaiting: "frequency" });
    assert.equal(s.dispatcher.activeSessions, 2);
  } finally {
    s.cleanup();
  }
});

test("callback queries are acknowledged", async () => {
  const s = setup();
  try {
    await s.dispatcher.handle({ ...chatEvent({ kind: "callback", data: "Monthly" }), callbackQueryId: "cb-1" });
    assert.deepEqual(s.transport.answered, ["cb-1"]);
    assert.deepEqual(s.transport.texts(), ["Please use /start to see what I can do."]);
  } finally {
    s.cleanup();
  }
});

test("a failed reply is followed by the generic error notice", async () => {
  const s = setup();
  try {
    s.transport.failNext = 1;
    await s.dispatcher.handle(chatEvent(command("start")));
    assert.deepEqual(s.transport.sent, [{ text: GENERIC_ERROR_TEXT, markup: { kind: "remove" }, target: { chatId: "u1" } }]);
    assert.deepEqual(s.dispatcher.stateOf("u1", "u1"), { flow: "idle" });
  } finally {
    s.cleanup();
  }
});

test("an undeliverable chat is logged without throwing", async () => {
  const s = setup();
  try {
    s.transport.failNext = 2;
    await s.dispatcher.handle(chatEvent(command("find")));
    assert.deepEqual(s.transport.sent, []);
    assert.deepEqual(s.dispatcher.stateOf("u1", "u1"), { flow: "finding", awaiting: "location" });
  } finally {
    s.cleanup();
  }
});
