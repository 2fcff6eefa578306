import { describe, expect, it } from "vitest";
import { MalformedJobError, QueueUnavailableError } from "./errors";
import type { Job } from "./job";
import { createLogger } from "./logger";
import { InMemoryJobQueue, type ListClient, RedisJobQueue } from "./queue";

const logger = createLogger("test", { write: () => undefined });

const job: Job = {
  jobId: "job-1",
  audioPath: "https://files.test/a.mp3",
  agentId: "agent-9",
  callbackUrl: "https://cb.test/hook",
  metadata: { source: "crm", tags: ["x", "y"] }
};

class FakeListClient implements ListClient {
  readonly lists = new Map<string, string[]>();
  failWith?: Error;

  async rpush(key: string, value: string): Promise<number> {
    if (this.failWith) throw this.failWith;
    const list = this.lists.get(key) ?? [];
    list.push(value);
    this.lists.set(key, list);
    return list.length;
  }

  async blpop(key: string): Promise<[string, string] | null> {
    if (this.failWith) throw this.failWith;
    const value = this.lists.get(key)?.shift();
    return value === undefined ? null : [key, value];
  }

  async quit(): Promise<unknown> {
    return "OK";
  }
}

describe("RedisJobQueue", () => {
  it("pushes the snake_case record and pops it back", async () => {
    const client = new FakeListClient();
    const queue = new RedisJobQueue(client, "transcription_jobs", logger);

    await queue.enqueue(job);

    expect(JSON.parse(client.lists.get("transcription_jobs")?.[0] ?? "")).toEqual({
      job_id: "job-1",
      audio_path: "https://files.test/a.mp3",
      agent_id: "agent-9",
      callback_url: "https://cb.test/hook",
      metadata: { source: "crm", tags: ["x", "y"] }
    });
    await expect(queue.dequeue(1)).resolves.toEqual(job);
    await expect(queue.dequeue(1)).resolves.toBeNull();
  });

  it("wraps transport failures as QueueUnavailableError", async () => {
    const client = new FakeListClient();
    client.failWith = new Error("connect ECONNREFUSED 127.0.0.1:6379");
    const queue = new RedisJobQueue(client, "jobs", logger);

    await expect(queue.enqueue(job)).rejects.toBeInstanceOf(QueueUnavailableError);
    await expect(queue.dequeue(1)).rejects.toThrow(
      "Could not dequeue from jobs: connect ECONNREFUSED 127.0.0.1:6379"
    );
  });

  it("rejects records it cannot decode", async () => {
    const client = new FakeListClient();
    client.lists.set("jobs", ['{"job_id": 7}']);
    const queue = new RedisJobQueue(client, "jobs", logger);

    await expect(queue.dequeue(1)).rejects.toBeInstanceOf(MalformedJobError);
  });
});

describe("InMemoryJobQueue", () => {
  it("hands jobs out in FIFO order", async () => {
    const queue = new InMemoryJobQueue();
    await queue.enqueue({ ...job, jobId: "first" });
    await queue.enqueue({ ...job, jobId: "second" });

    expect((await queue.dequeue(1))?.jobId).toBe("first");
    expect((await queue.dequeue(1))?.jobId).toBe("second");
  });

  it("wakes a waiting consumer when a job arrives", async () => {
    const queue = new InMemoryJobQueue();
    const pending = queue.dequeue(5);

    await queue.enqueue(job);

    await expect(pending).resolves.toEqual(job);
    expect(queue.size).toBe(0);
  });

  it("gives a job to only one of two waiting consumers", async () => {
    const queue = new InMemoryJobQueue();
    const first = queue.dequeue(0.05);
    const second = queue.dequeue(0.05);

    await queue.enqueue(job);

    const results = await Promise.all([first, second]);
    expect(results.filter((result) => result !== null)).toHaveLength(1);
    expect(results[0]?.jobId).toBe("job-1");
    expect(results[1]).toBeNull();
  });

  it("resolves null after the timeout", async () => {
    const queue = new InMemoryJobQueue();

    await expect(queue.dequeue(0.01)).resolves.toBeNull();
  });

  it("releases waiting consumers on close", async () => {
    const queue = new InMemoryJobQueue();
    const pending = queue.dequeue(5);

    await queue.close();

    await expect(pending).resolves.toBeNull();
  });
});
