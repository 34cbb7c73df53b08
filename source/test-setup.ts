import os from 'node:os';
import path from 'node:path';

// Ensure tests never write to real user data directories.
process.env['PEER_RANK_HOME'] =
	process.env['PEER_RANK_HOME'] ??
	path.join(os.tmpdir(), `peer-rank-test-home-${process.pid}`);
