/**
 * Run State Repository
 * JSON 파일 기반 실행 진행 상태 (완료 엔트리 URL 집합)
 *
 * 목적:
 * - 중단 후 재실행 시 완료된 컬러 건너뛰기
 * - 엔트리 완료마다 즉시 flush ({ "done": [정렬된 URL] })
 *
 * SOLID 원칙:
 * - SRP: 진행 상태 저장만 담당
 * - DIP: IRunProgressStore 구현
 */

import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";

import type { IRunProgressStore } from "@/core/interfaces";
import { logger } from "@/config/logger";
import { toErrorMessage } from "@/core/errors/ScannerErrors";

const RunStateSchema = z.object({
  done: z.array(z.string()).default([]),
});

export type RunState = z.infer<typeof RunStateSchema>;

export class RunStateRepository implements IRunProgressStore {
  private readonly done = new Set<string>();

  constructor(private readonly filePath: string) {}

  /**
   * 상태 파일 로드
   * 없거나 손상되었으면 빈 상태에서 시작
   */
  async load(): Promise<void> {
    this.done.clear();

    let text: string;
    try {
      text = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      logger.debug(
        { filePath: this.filePath, error: toErrorMessage(error) },
        "[RunState] 상태 파일 없음 - 새로 시작",
      );
      return;
    }

    try {
      const state = RunStateSchema.parse(JSON.parse(text));
      state.done.forEach((url) => this.done.add(url));
      logger.info(
        { filePath: this.filePath, done: this.done.size },
        "[RunState] 상태 로드 완료",
      );
    } catch (error) {
      logger.warn(
        { filePath: this.filePath, error: toErrorMessage(error) },
        "[RunState] 상태 파일 손상 - 빈 상태로 시작",
      );
    }
  }

  isDone(url: string): boolean {
    return this.done.has(url);
  }

  async markDone(url: string): Promise<void> {
    this.done.add(url);
    await this.flush();
  }

  get size(): number {
    return this.done.size;
  }

  private async flush(): Promise<void> {
    const state: RunState = { done: [...this.done].sort() };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(
      this.filePath,
      JSON.stringify(state, null, 2),
      "utf-8",
    );
  }
}
