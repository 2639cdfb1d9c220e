/**
 * Global Vitest Setup
 *
 * Runs ONCE at test suite startup so results do not depend on the shell the
 * suite was started from.
 *
 * Git reads these variables before any discovery of its own, so a value
 * inherited from a hook or a `git rebase --exec` would point every fixture
 * command at the wrong repository.
 */

for (const key of ['GIT_DIR', 'GIT_WORK_TREE', 'GIT_INDEX_FILE', 'GIT_CEILING_DIRECTORIES', 'GIT_DISCOVERY_ACROSS_FILESYSTEM']) {
  delete process.env[key];
}

// Debug output would interleave with captured console output
delete process.env.GIT_HANDLE_DEBUG;
