/**
 * Run Progress Store Interface
 *
 * 완료된 카탈로그 엔트리 URL 집합 (재개용)
 * 엔트리 단위로만 조회/갱신 (행 처리 중 갱신 없음)
 */
export interface IRunProgressStore {
  /** 저장된 상태 읽기 (없거나 손상되면 빈 상태) */
  load(): Promise<void>;

  isDone(url: string): boolean;

  /** 추가 후 즉시 flush */
  markDone(url: string): Promise<void>;
}
