import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { BarChart, createSvgSurface, parseDataset, playBarChartRace } from '../../src/index';

const datasetPath = fileURLToPath(new URL('../data/towns.txt', import.meta.url));
const dataset = parseDataset(readFileSync(datasetPath, 'utf8'));

const chart = new BarChart(dataset.title, dataset.xAxisLabel, dataset.dataSource);
const surface = createSvgSurface({
  width: 1000,
  height: 700,
  onFrame: (svg) => {
    console.log(`frame: ${svg.length} bytes of SVG`);
  },
});

const result = await playBarChartRace(chart, dataset.frames, surface, {
  numBars: dataset.maxBars,
  frameDelayMs: 100,
});
console.log(`drew ${result.framesDrawn} frames, skipped ${result.framesSkipped}`);
