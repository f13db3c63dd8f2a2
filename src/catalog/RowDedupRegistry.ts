/**
 * RowDedupRegistry
 *
 * 실행 범위 (finish, SKU) 중복 제거 집합
 * 추가만 가능 (삭제 없음), 실행 루프가 소유하고 워커에 참조로 전달
 */
export class RowDedupRegistry {
  private readonly seen = new Set<string>();

  /**
   * 처음 보는 키면 기록 후 true
   * SKU가 비어 있으면 중복 판단 없이 항상 true
   */
  markIfNew(finish: string, identifier: string): boolean {
    if (!identifier) return true;
    const key = `${finish}\u0000${identifier}`;
    if (this.seen.has(key)) return false;
    this.seen.add(key);
    return true;
  }

  get size(): number {
    return this.seen.size;
  }
}
