/**
 * 문장 파일을 단어 수 제한에 맞게 재작성하는 스크립트
 *
 * 사용법:
 * npm run rewrite -- <sentences.txt|sentences.json> [--limit 8] [--mode oracle-rewrite|mechanical-only]
 *                    [--show-original] [--log] [--estimate] [--check]
 *
 * 입력: 한 줄에 한 문장인 텍스트 파일, 또는 문자열 배열 JSON
 * 환경변수: .env.example 참고 (AI_PROVIDER, OPENAI_API_KEY 등)
 */

import { readFile } from 'node:fs/promises';
import { getAiConfig, getCostRates, getRewriteDefaults } from '@/ai/config';
import { estimateRunCost } from '@/ai/rewrite/cost';
import { buildExportRows, buildProcessingLog } from '@/ai/rewrite/exportRows';
import { createRewritingOracle } from '@/ai/rewrite/oracle';
import { OracleClient } from '@/ai/rewrite/oracleClient';
import { followRewriteRun, startRewriteRun } from '@/ai/rewrite/orchestrator';
import { RewriteCache } from '@/ai/rewrite/rewriteCache';
import type { ProcessingMode } from '@/ai/rewrite/types';
import { createRunMetricsStore } from '@/stores/runMetricsStore';

interface CliArgs {
  file: string | undefined;
  limit: number | undefined;
  mode: ProcessingMode | undefined;
  showOriginal: boolean;
  log: boolean;
  estimate: boolean;
  check: boolean;
}

function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    file: undefined,
    limit: undefined,
    mode: undefined,
    showOriginal: false,
    log: false,
    estimate: false,
    check: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--limit') {
      args.limit = Number(argv[++i]);
    } else if (arg === '--mode') {
      const mode = argv[++i];
      if (mode !== 'oracle-rewrite' && mode !== 'mechanical-only') {
        throw new Error(`알 수 없는 모드: ${mode ?? '(없음)'}`);
      }
      args.mode = mode;
    } else if (arg === '--show-original') {
      args.showOriginal = true;
    } else if (arg === '--log') {
      args.log = true;
    } else if (arg === '--estimate') {
      args.estimate = true;
    } else if (arg === '--check') {
      args.check = true;
    } else if (arg !== undefined && !arg.startsWith('--')) {
      args.file = arg;
    }
  }
  return args;
}

async function readSentences(file: string): Promise<string[]> {
  const raw = await readFile(file, 'utf8');
  if (file.endsWith('.json')) {
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === 'string')) {
      throw new Error(`${file}: 문자열 배열이 아닙니다.`);
    }
    return parsed;
  }
  return raw.split(/\r?\n/).filter((line) => line.trim().length > 0);
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const defaults = getRewriteDefaults();
  const aiConfig = getAiConfig();
  const costRates = getCostRates(aiConfig);

  if (args.check) {
    const client = new OracleClient(createRewritingOracle(aiConfig), { metrics: createRunMetricsStore(), costRates });
    const result = await client.verifyCredentials();
    console.log(result.ok ? `✅ ${result.message}` : `❌ ${result.message}`);
    process.exitCode = result.ok ? 0 : 1;
    return;
  }

  if (!args.file) {
    console.error('문장 파일 경로가 필요합니다.');
    console.log('npm run rewrite -- <sentences.txt|sentences.json> [--limit 8] [--mode mechanical-only]');
    process.exitCode = 1;
    return;
  }

  const sentences = await readSentences(args.file);
  const limit = args.limit ?? defaults.limit;
  const mode = args.mode ?? defaults.mode;

  if (args.estimate) {
    const estimate = estimateRunCost(sentences, limit, costRates);
    console.log(`=== 예상 비용 (${aiConfig.provider}/${aiConfig.model}) ===`);
    console.log(JSON.stringify(estimate, null, 2));
    return;
  }

  const run = startRewriteRun({
    sentences,
    limit,
    mode,
    oracle: mode === 'oracle-rewrite' ? createRewritingOracle(aiConfig) : undefined,
    cache: new RewriteCache(defaults.cacheSize),
    costRates,
    config: { concurrency: defaults.concurrency, callTimeoutMs: defaults.callTimeoutMs },
  });

  process.once('SIGINT', () => {
    console.error('\n취소 요청: 진행 중인 호출이 끝나면 멈춥니다.');
    run.cancel();
  });

  const result = await followRewriteRun(run, (event) => {
    if (event.type === 'progress') {
      console.error(`[${event.stage}] ${event.completed}/${event.total}`);
    } else if (event.type === 'warning') {
      console.error(`⚠️ ${event.message}`);
    }
  });

  const output = args.log
    ? buildProcessingLog(result.records)
    : buildExportRows(result.records, { showOriginal: args.showOriginal });
  console.log(JSON.stringify(output, null, 2));

  if (result.cancelled) {
    console.error(`미처리 문장: ${result.unprocessedIndices.map((i) => i + 1).join(', ')}`);
    process.exitCode = 130;
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
