/**
 * Session Provider Interface
 *
 * 인증된 브라우저 세션을 제공
 * 코어는 세션이 이미 인증되어 있다고 가정하고 navigate만 호출
 */

import type { ISurfacePage } from "./ISurface";

export interface ISessionProvider {
  /**
   * 세션 열기
   * 저장된 세션이 없으면 FatalPreconditionError
   */
  open(): Promise<ISurfacePage>;

  close(): Promise<void>;
}
