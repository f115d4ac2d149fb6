import { performance } from 'node:perf_hooks';

import dotenv from 'dotenv';

import { compareAlgorithms } from '../lib/cutlist/compare';
import { loadCutlistConfig } from '../lib/cutlist/config';
import { CuttingOptimizer } from '../lib/cutlist/optimizer';
import { PACKING_ALGORITHMS, type CutlistPart, type PackingAlgorithm } from '../lib/cutlist/types';

dotenv.config({ path: './.env.local' });

type BenchmarkMetrics = {
  algorithm: PackingAlgorithm;
  sheets: number;
  utilizationPct: number;
  wastePct: number;
  cuts: number;
  cutLength: number;
  score: number;
  runtimeMsAvg: number;
};

const SHEET = { width: 2750, height: 1830, materialRef: 'white-melamine', thickness: 16 };

const PARTS: CutlistPart[] = [
  { name: 'Side', length: 720, width: 560, thickness: 16, quantity: 4, materialRef: 'white-melamine', rotatable: false },
  { name: 'Top', length: 900, width: 600, thickness: 16, quantity: 2, materialRef: 'white-melamine' },
  { name: 'Shelf', length: 864, width: 540, thickness: 16, quantity: 6, materialRef: 'white-melamine' },
  { name: 'Door', length: 716, width: 446, thickness: 16, quantity: 4, materialRef: 'white-melamine', rotatable: false },
  { name: 'Drawer front', length: 446, width: 180, thickness: 16, quantity: 8, materialRef: 'white-melamine' },
];

const ITERATIONS = 20;

function toPct(value: number): number {
  return Math.round(value * 100) / 100;
}

function averageRuntime(run: () => void, iterations: number): number {
  // Warm-up
  run();
  const start = performance.now();
  for (let i = 0; i < iterations; i++) {
    run();
  }
  const end = performance.now();
  return (end - start) / iterations;
}

function benchmark(optimizer: CuttingOptimizer): { metrics: BenchmarkMetrics[]; best: PackingAlgorithm } {
  const comparison = compareAlgorithms(
    PARTS,
    SHEET.width,
    SHEET.height,
    SHEET.materialRef,
    SHEET.thickness,
    optimizer
  );

  const metrics = PACKING_ALGORITHMS.map((algorithm) => {
    const { summary, score } = comparison.results[algorithm];
    const run = () => {
      optimizer.optimize(PARTS, SHEET.width, SHEET.height, SHEET.materialRef, SHEET.thickness, algorithm);
    };
    return {
      algorithm,
      sheets: summary.totalSheets,
      utilizationPct: toPct(summary.overallUtilizationPercent),
      wastePct: toPct(summary.overallWastePercent),
      cuts: summary.totalCutCount,
      cutLength: summary.totalCutLengthMm,
      score: toPct(score),
      runtimeMsAvg: toPct(averageRuntime(run, ITERATIONS)),
    };
  });
  return { metrics, best: comparison.bestAlgorithm };
}

function formatLength(value: number): string {
  return Math.round(value).toLocaleString('en-ZA');
}

function printResults(results: BenchmarkMetrics[], best: PackingAlgorithm, kerf: number): void {
  console.log('\nCutlist Benchmark (Single Dataset)');
  console.log(`Sheet: ${SHEET.width} x ${SHEET.height} (kerf ${kerf}mm)`);
  console.log(`Parts: ${PARTS.map((p) => `${p.name} ${p.length}x${p.width} x${p.quantity}`).join(', ')}`);
  console.log('\nResults:');

  for (const r of results) {
    console.log(`\n- ${r.algorithm}`);
    console.log(`  Sheets used: ${r.sheets}`);
    console.log(`  Utilization: ${r.utilizationPct}% (waste ${r.wastePct}%)`);
    console.log(`  Cuts: ${r.cuts}`);
    console.log(`  Cut length: ${formatLength(r.cutLength)} mm`);
    console.log(`  Score: ${r.score}`);
    console.log(`  Avg runtime: ${r.runtimeMsAvg} ms (${ITERATIONS} runs)`);
  }

  console.log(`\nBest: ${best}`);
}

try {
  const config = loadCutlistConfig();
  const optimizer = new CuttingOptimizer(config);
  const { metrics, best } = benchmark(optimizer);
  printResults(metrics, best, config.kerfWidth);
} catch (err) {
  console.error('Benchmark failed:', err);
  process.exitCode = 1;
}
