import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { RunStateRepository } from "@/repositories/RunStateRepository";

describe("RunStateRepository", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "catalog-state-"));
    filePath = path.join(dir, "state", "run_state.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("상태 파일이 없으면 빈 상태로 시작해야 함", async () => {
    const repository = new RunStateRepository(filePath);

    await repository.load();

    expect(repository.size).toBe(0);
    expect(repository.isDone("https://www.example.com/colours/a/")).toBe(false);
  });

  it("완료 표시마다 정렬된 목록을 즉시 기록해야 함", async () => {
    const repository = new RunStateRepository(filePath);
    await repository.load();

    await repository.markDone("https://www.example.com/colours/b/");
    await repository.markDone("https://www.example.com/colours/a/");

    const saved: unknown = JSON.parse(await fs.readFile(filePath, "utf-8"));
    expect(saved).toEqual({
      done: [
        "https://www.example.com/colours/a/",
        "https://www.example.com/colours/b/",
      ],
    });
  });

  it("다음 실행에서 완료 목록을 복원해야 함", async () => {
    const first = new RunStateRepository(filePath);
    await first.markDone("https://www.example.com/colours/a/");

    const second = new RunStateRepository(filePath);
    await second.load();

    expect(second.isDone("https://www.example.com/colours/a/")).toBe(true);
    expect(second.size).toBe(1);
  });

  it("손상된 상태 파일은 빈 상태로 처리해야 함", async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, "{ not json", "utf-8");
    const repository = new RunStateRepository(filePath);

    await repository.load();

    expect(repository.size).toBe(0);
  });

  it("done 키가 없으면 빈 목록", async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, "{}", "utf-8");
    const repository = new RunStateRepository(filePath);

    await repository.load();

    expect(repository.size).toBe(0);
  });
});
