import { describeError } from '@roadwatch/pipeline';
import { parseReplayArgs } from './cli';
import { runReplay } from './run';

async function main() {
	const options = parseReplayArgs(process.argv.slice(2));
	const controller = new AbortController();
	process.once('SIGINT', () => {
		console.log('[replay] interrupted, stopping');
		controller.abort();
	});
	await runReplay(options, { signal: controller.signal });
}

main().catch((error: unknown) => {
	console.error('[replay] failed:', describeError(error));
	process.exitCode = 1;
});
