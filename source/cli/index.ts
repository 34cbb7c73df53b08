#!/usr/bin/env node
import meow from 'meow';
import {buildRankOptions, runRankCommand} from './commands/rank.js';
import {createCliLogger, handleCliError} from './utils/error-handler.js';

const cli = meow(
	`
	Usage
	  $ peer-rank <candidates.json> --title <title> --artist <artist>

	Options
	  --title     Title of the track searched for
	  --artist    Artist of the track searched for
	  --length    Expected length in seconds
	  --bpm       Expected tempo
	  --policy    quality-first | dj-ready | data-saver (default: from config)
	  --block     Source to exclude; repeat or comma-separate
	  --config    Config file (default: $PEER_RANK_HOME/config.json)
	  --json      Print the full result as JSON
	  --explain   Show tier rationale and forensic notes

	Examples
	  $ peer-rank results.json --artist "Night Drive" --title "Coastline" --length 312
	  $ peer-rank results.json --artist Halden --title Undertow --bpm 124 --policy dj-ready
`,
	{
		importMeta: import.meta,
		flags: {
			title: {type: 'string'},
			artist: {type: 'string'},
			length: {type: 'number'},
			bpm: {type: 'number'},
			policy: {type: 'string'},
			block: {type: 'string', isMultiple: true},
			config: {type: 'string'},
			json: {type: 'boolean', default: false},
			explain: {type: 'boolean', default: false},
		},
	},
);

const logger = createCliLogger();

try {
	const options = buildRankOptions(cli.input, cli.flags);
	const {text} = await runRankCommand(options, logger);
	process.stdout.write(text + '\n');
} catch (error) {
	handleCliError('RankCommand', error, logger);
	process.exitCode = 1;
}
