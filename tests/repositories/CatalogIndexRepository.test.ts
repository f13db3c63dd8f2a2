import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { CatalogIndexRepository } from "@/repositories/CatalogIndexRepository";
import { FatalPreconditionError } from "@/core/errors/ScannerErrors";
import type { CatalogEntry } from "@/core/domain/CatalogEntry";

describe("CatalogIndexRepository", () => {
  let dir: string;
  let filePath: string;
  let repository: CatalogIndexRepository;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "catalog-index-"));
    filePath = path.join(dir, "colours_index.json");
    repository = new CatalogIndexRepository(filePath);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("저장한 순서 그대로 로드해야 함", async () => {
    const entries: CatalogEntry[] = [
      { name: "Black Oak", url: "https://www.example.com/colours/black-oak/", slug: "black-oak" },
      { name: "Arctic White", url: "https://www.example.com/colours/arctic-white/" },
    ];

    await repository.save(entries);

    await expect(repository.load()).resolves.toEqual(entries);
  });

  it("파일이 없으면 FatalPreconditionError", async () => {
    const load = repository.load();

    await expect(load).rejects.toBeInstanceOf(FatalPreconditionError);
    await expect(load).rejects.toThrow('(run "index" first)');
  });

  it("JSON이 아니면 FatalPreconditionError", async () => {
    await fs.writeFile(filePath, "[", "utf-8");

    await expect(repository.load()).rejects.toThrow("not valid JSON");
  });

  it("항목 형식이 틀리면 FatalPreconditionError", async () => {
    await fs.writeFile(filePath, JSON.stringify([{ name: "X", url: "nope" }]), "utf-8");

    await expect(repository.load()).rejects.toThrow("malformed");
  });

  it("빈 목록이면 FatalPreconditionError", async () => {
    await fs.writeFile(filePath, "[]", "utf-8");

    await expect(repository.load()).rejects.toThrow("empty");
  });
});
