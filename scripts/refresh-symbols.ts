// Symbol-master download - execute with: npm run symbols:refresh [-- NSE,MCX]
import { EXCHANGES, loadEnvFile } from '../src/lib/config';
import { refreshSymbolMaster } from '../src/services/instruments';
import type { Exchange } from '../src/types';

loadEnvFile();

const requested = process.argv[2]?.split(',').map((e) => e.trim().toUpperCase());
const exchanges: Exchange[] = requested ? EXCHANGES.filter((e) => requested.includes(e)) : [...EXCHANGES];

if (exchanges.length === 0) {
  console.error(`No known exchanges in "${process.argv[2]}". Known: ${EXCHANGES.join(', ')}`);
  process.exit(1);
}

console.log(`Refreshing symbol master for ${exchanges.join(', ')}...`);
const reports = await refreshSymbolMaster({ exchanges });

for (const report of reports) {
  if (report.ok) {
    console.log(`  + ${report.exchange}: ${report.file} (${report.bytes} bytes)`);
  } else {
    console.error(`  ! ${report.exchange}: ${report.error}`);
  }
}

if (reports.some((r) => !r.ok)) {
  process.exit(1);
}
