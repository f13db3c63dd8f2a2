/**
 * CLI 인자 파싱
 *
 * catalog-scanner <command> [OPTIONS]
 *   login
 *   index
 *   run [--start N] [--limit N]
 *   run-one
 */

export type CliCommand = "login" | "index" | "run" | "run-one" | "help";

export interface CliArgs {
  command: CliCommand;
  startIndex: number;
  limit: number;
}

const COMMANDS: readonly CliCommand[] = ["login", "index", "run", "run-one", "help"];

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

/**
 * 0 이상 정수만 허용
 */
function parseCount(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || raw === "" || !Number.isInteger(value) || value < 0) {
    throw new Error(`${flag} 값은 0 이상 정수여야 함: ${raw ?? "(없음)"}`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const [first, ...rest] = argv;
  const args: CliArgs = { command: "help", startIndex: 0, limit: 0 };

  if (!first || first === "--help" || first === "-h") {
    return args;
  }
  if (!isCommand(first)) {
    throw new Error(`알 수 없는 명령: ${first}`);
  }
  args.command = first;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    if (arg === "--start") {
      args.startIndex = parseCount(arg, rest[++i]);
    } else if (arg.startsWith("--start=")) {
      args.startIndex = parseCount("--start", arg.substring("--start=".length));
    } else if (arg === "--limit") {
      args.limit = parseCount(arg, rest[++i]);
    } else if (arg.startsWith("--limit=")) {
      args.limit = parseCount("--limit", arg.substring("--limit=".length));
    } else if (arg === "--help" || arg === "-h") {
      args.command = "help";
    } else {
      throw new Error(`알 수 없는 옵션: ${arg}`);
    }
  }

  return args;
}

export const USAGE = `
Catalog Scanner

사용법:
  catalog-scanner <command> [OPTIONS]

명령:
  login                 로그인 후 세션 저장 (CATALOG_USERNAME / CATALOG_PASSWORD)
  index                 컬러 인덱스 수집 → colours_index.json
  run                   인덱스 전체 실행 (완료 엔트리 건너뜀)
  run-one               첫 번째 엔트리만 실행 (진행 상태 무시)

옵션 (run):
  --start <n>           시작 위치 (0부터)
  --limit <n>           최대 엔트리 수 (0 = 제한 없음)
  --help, -h            이 도움말 출력

예시:
  catalog-scanner run --start 10 --limit 5
`;
