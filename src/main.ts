#!/usr/bin/env node
import 'dotenv/config';
import { createConfluenceClient, createJiraClient } from './atlassian/index.js';
import { loadConfig, missingVariables } from './config.js';
import { errorMessage } from './http/errors.js';
import { log, setLogLevel } from './log.js';
import { startConfluenceToolServer, startJiraToolServer, type ToolServerHandle } from './servers/index.js';
import { VERSION } from './version.js';

export async function main() {
	const cfg = loadConfig();
	setLogLevel(cfg.logLevel);
	const startTs = Date.now();
	log({ evt: 'tools_start', msg: 'starting tool servers', version: VERSION });

	const starting: Promise<ToolServerHandle>[] = [];
	if (cfg.jira) starting.push(startJiraToolServer(createJiraClient(cfg), { port: cfg.servers.jiraPort }));
	else
		log({
			evt: 'tools_skip',
			msg: `jira disabled, missing ${missingVariables('jira').join(', ')}`,
			lvl: 'warn',
			client: 'jira',
		});
	if (cfg.confluence)
		starting.push(
			startConfluenceToolServer(createConfluenceClient(cfg), { port: cfg.servers.confluencePort }),
		);
	else
		log({
			evt: 'tools_skip',
			msg: `confluence disabled, missing ${missingVariables('confluence').join(', ')}`,
			lvl: 'warn',
			client: 'confluence',
		});
	if (!starting.length) throw new Error('nothing to serve: configure Jira and/or Confluence');

	const handles = await Promise.all(starting);
	log({
		evt: 'tools_ready',
		msg: 'tool servers started',
		count: handles.length,
		durationMs: Date.now() - startTs,
	});

	const shutdown = () => {
		Promise.all(handles.map(h => h.close())).then(
			() => process.exit(0),
			e => {
				log({ evt: 'tools_shutdown_error', msg: 'shutdown failed', lvl: 'error', reason: errorMessage(e) });
				process.exit(1);
			},
		);
	};
	process.once('SIGINT', shutdown);
	process.once('SIGTERM', shutdown);
}

main().catch(e => {
	log({
		evt: 'tools_fatal',
		msg: 'fatal startup error',
		lvl: 'error',
		reason: errorMessage(e),
	});
	process.exit(1);
});
