/**
 * MoqResolver
 *
 * 행별 최소 주문 수량(MOQ) / 주문 배수 판별
 *
 * 출처 두 가지를 필드별 최댓값으로 병합:
 * - 수량 input의 min / step 속성 (step="any"는 제약 없음)
 * - 행 안의 경고/결과 텍스트 패턴 매칭
 *
 * 신호가 없으면 (min=1, step=1) - 에러 아님
 */

import type { ISurfaceElement } from "@/core/interfaces";
import type { MoqConstraint } from "@/core/domain/CatalogRecord";
import { ROW_SELECTORS, STEP_NO_CONSTRAINT } from "@/catalog/CatalogSelectors";
import { logger } from "@/config/logger";
import { toErrorMessage } from "@/core/errors/ScannerErrors";

/**
 * 텍스트/속성에서 읽은 힌트 (없으면 undefined)
 */
export interface MoqHint {
  min?: number;
  step?: number;
}

/**
 * 행에서 읽은 힌트 + 근거 텍스트
 */
export interface MoqHintReading extends MoqHint {
  evidence: string[];
}

/**
 * "Minimum order qty: 10", "min quantity 6", "minimum of 3"
 */
const MIN_PATTERN =
  /\b(?:minimum|min\.?)\s*(?:order\s*)?(?:qty|quantity)?\s*(?:is|of)?\s*[:=-]?\s*(\d+)/gi;

/**
 * "MOQ: 4"
 */
const MOQ_PATTERN = /\bMOQ\b\s*(?:is|of)?\s*[:=-]?\s*(\d+)/gi;

/**
 * "multiples of 5", "packs of 4"
 */
const STEP_PATTERN = /\b(?:multiples?|packs?)\s+of\s+(\d+)/gi;

function positiveInt(raw: string | null | undefined): number | undefined {
  if (!raw) return undefined;
  const value = Number.parseInt(raw.trim(), 10);
  return Number.isFinite(value) && value >= 1 ? value : undefined;
}

function maxMatch(text: string, pattern: RegExp): number | undefined {
  let best: number | undefined;
  for (const match of text.matchAll(pattern)) {
    const value = positiveInt(match[1]);
    if (value !== undefined && (best === undefined || value > best)) {
      best = value;
    }
  }
  return best;
}

/**
 * 둘 다 있으면 큰 값 (raw 속성은 기본값으로 남아 있는 경우가 많음)
 */
export function mergeMax(
  a: number | undefined,
  b: number | undefined,
): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.max(a, b);
}

export class MoqResolver {
  constructor(private readonly attributeTimeoutMs: number) {}

  /**
   * 텍스트 패턴 파싱 (순수 함수)
   */
  static parseHintText(text: string): MoqHint {
    const min = mergeMax(maxMatch(text, MIN_PATTERN), maxMatch(text, MOQ_PATTERN));
    const step = maxMatch(text, STEP_PATTERN);
    return { min, step };
  }

  /**
   * 유효 수량 계산
   * max(requested, min) 후 step 배수로 올림
   */
  static bump(requested: number, min: number, step: number): number {
    let effective = Math.max(requested, min, 1);
    if (step > 1 && effective % step !== 0) {
      effective = Math.ceil(effective / step) * step;
    }
    return effective;
  }

  /**
   * 조회 결과 텍스트에 MOQ 메시지가 있으면 재시도 필요
   */
  static needsRetry(stockText: string, priceText: string): boolean {
    return [stockText, priceText].some((text) => {
      const hint = MoqResolver.parseHintText(text);
      return hint.min !== undefined || hint.step !== undefined;
    });
  }

  /**
   * 힌트를 제약으로 확정 (기본값 1)
   */
  static toConstraint(hint: MoqHint): MoqConstraint {
    return {
      minimumQuantity: hint.min ?? 1,
      orderMultiple: hint.step ?? 1,
    };
  }

  /**
   * 행의 input 속성 + 경고/결과 텍스트에서 힌트 수집
   */
  async readHints(row: ISurfaceElement): Promise<MoqHintReading> {
    const input = row.locator(ROW_SELECTORS.QTY_INPUT);
    const minAttr = await this.safeAttribute(input, "min");
    const stepAttr = await this.safeAttribute(input, "step");

    const attrMin = positiveInt(minAttr);
    const attrStep =
      stepAttr?.trim().toLowerCase() === STEP_NO_CONSTRAINT
        ? undefined
        : positiveInt(stepAttr);

    const textReading = await this.readTextHints(row);

    return {
      min: mergeMax(attrMin, textReading.min),
      step: mergeMax(attrStep, textReading.step),
      evidence: textReading.evidence,
    };
  }

  /**
   * 행 안의 경고/결과 텍스트만 다시 스캔
   */
  async readTextHints(row: ISurfaceElement): Promise<MoqHintReading> {
    const evidence = await this.readEvidence(row);
    const hint = MoqResolver.parseHintText(evidence.join("\n"));
    return { ...hint, evidence };
  }

  private async readEvidence(row: ISurfaceElement): Promise<string[]> {
    const regions = row.all(
      [
        ROW_SELECTORS.WARNINGS,
        ROW_SELECTORS.STOCK_RESULT,
        ROW_SELECTORS.PRICE_RESULT,
      ].join(", "),
    );

    const texts: string[] = [];
    try {
      const count = await regions.count();
      for (let i = 0; i < count; i++) {
        const text = await regions.nth(i).textContent(this.attributeTimeoutMs);
        const trimmed = (text ?? "").trim();
        if (trimmed) texts.push(trimmed);
      }
    } catch (error) {
      logger.debug({ error: toErrorMessage(error) }, "MOQ 근거 텍스트 읽기 실패");
    }
    return texts;
  }

  private async safeAttribute(
    element: ISurfaceElement,
    name: string,
  ): Promise<string | null> {
    try {
      return await element.getAttribute(name, this.attributeTimeoutMs);
    } catch (error) {
      logger.debug({ name, error: toErrorMessage(error) }, "수량 input 속성 없음");
      return null;
    }
  }
}
