import os from 'node:os';
import path from 'node:path';

// Ensure tests never write to real user data directories.
process.env['SOLOPACK_HOME'] =
	process.env['SOLOPACK_HOME'] ??
	path.join(os.tmpdir(), `solopack-test-home-${process.pid}`);
