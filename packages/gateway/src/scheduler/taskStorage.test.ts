import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ScheduledTaskStorage } from "./taskStorage";
import type { ScheduledChatTask } from "./types";

const task: ScheduledChatTask = {
  id: "task-1",
  title: "Digest",
  taskRequest: "Summarize the news",
  intervalSeconds: 3600,
  executeImmediately: true,
  providerId: "openai",
  model: "gpt-5-mini",
  createdAt: 1_700_000_000_000,
};

describe("ScheduledTaskStorage", () => {
  let dir: string;
  let storage: ScheduledTaskStorage;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), "task-storage-"));
    storage = new ScheduledTaskStorage(join(dir, "tasks"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("saves a task with its session and reads it back", async () => {
    await storage.saveTask(task, "session-1");

    const loaded = await storage.loadTask("task-1");

    expect(loaded.ok && loaded.value).toEqual({ task, sessionId: "session-1" });
    expect(await fs.readdir(join(dir, "tasks"))).toEqual(["task-1.json"]);
  });

  it("overwrites an existing file in place", async () => {
    await storage.saveTask(task);
    await storage.saveTask(task, "session-2");

    const loaded = await storage.loadTask("task-1");

    expect(loaded.ok && loaded.value.sessionId).toBe("session-2");
  });

  it("reports missing files as not found", async () => {
    const loaded = await storage.loadTask("missing");

    expect(!loaded.ok && loaded.error.kind).toBe("not_found");
  });

  it("returns an empty list before anything is stored", async () => {
    const loaded = await storage.loadAllTasks();

    expect(loaded.ok && loaded.value).toEqual([]);
  });

  it("skips files with the wrong shape", async () => {
    await storage.saveTask(task);
    await fs.writeFile(join(dir, "tasks", "bad.json"), JSON.stringify({ id: "bad", intervalSeconds: -1 }));
    await fs.writeFile(join(dir, "tasks", "notes.txt"), "ignored");

    const loaded = await storage.loadAllTasks();

    expect(loaded.ok && loaded.value.map((stored) => stored.task.id)).toEqual(["task-1"]);
  });

  it("deletes task files and tolerates missing ones", async () => {
    await storage.saveTask(task);

    const first = await storage.deleteTask("task-1");
    const second = await storage.deleteTask("task-1");

    expect(first.ok && second.ok).toBe(true);
    expect(await fs.readdir(join(dir, "tasks"))).toEqual([]);
  });
});
