import { afterEach, describe, expect, it, vi } from 'vitest';
import { currentLogLevel, isLogLevel, isTruthy, log, setLogLevel } from './log.js';

afterEach(() => {
	setLogLevel(undefined);
	vi.unstubAllEnvs();
});

describe('log', () => {
	it('writes one JSON record per line', () => {
		setLogLevel('info');
		vi.stubEnv('LOG_PRETTY', '');
		const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
		log({ evt: 'jira_search', msg: 'found 2 issues', client: 'jira', count: 2 });
		expect(spy).toHaveBeenCalledTimes(1);
		const rec: unknown = JSON.parse(String(spy.mock.calls[0][0]));
		expect(rec).toMatchObject({ lvl: 'info', evt: 'jira_search', msg: 'found 2 issues', client: 'jira', count: 2 });
		expect(rec).toHaveProperty('t');
	});

	it('drops records below the threshold', () => {
		setLogLevel('warn');
		const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
		log({ evt: 'a', msg: 'info' });
		log({ evt: 'b', msg: 'debug', lvl: 'debug' });
		log({ evt: 'c', msg: 'warn', lvl: 'warn' });
		log({ evt: 'd', msg: 'error', lvl: 'error' });
		expect(spy).toHaveBeenCalledTimes(2);
	});

	it('silent drops everything', () => {
		setLogLevel('silent');
		const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
		log({ evt: 'x', msg: 'boom', lvl: 'error' });
		expect(spy).not.toHaveBeenCalled();
	});

	it('prints plain lines when LOG_PRETTY is set', () => {
		setLogLevel('debug');
		vi.stubEnv('LOG_PRETTY', '1');
		const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
		log({ evt: 'http_retry', msg: 'retrying request', lvl: 'warn', client: 'confluence' });
		expect(String(spy.mock.calls[0][0])).toMatch(/^\S+ WARN \[confluence\] http_retry retrying request$/);
	});
});

describe('currentLogLevel', () => {
	it('reads LOG_LEVEL, then DEBUG, then defaults to info', () => {
		vi.stubEnv('LOG_LEVEL', 'ERROR');
		expect(currentLogLevel()).toBe('error');
		vi.stubEnv('LOG_LEVEL', '');
		vi.stubEnv('DEBUG', 'yes');
		expect(currentLogLevel()).toBe('debug');
		vi.stubEnv('DEBUG', '0');
		expect(currentLogLevel()).toBe('info');
	});

	it('prefers an explicit level', () => {
		vi.stubEnv('LOG_LEVEL', 'error');
		setLogLevel('debug');
		expect(currentLogLevel()).toBe('debug');
	});
});

describe('helpers', () => {
	it('recognises levels and truthy flags', () => {
		expect(isLogLevel('warn')).toBe(true);
		expect(isLogLevel('verbose')).toBe(false);
		expect(['1', 'true', 'YES', ' on '].map(isTruthy)).toEqual([true, true, true, true]);
		expect(['0', 'false', '', undefined].map(isTruthy)).toEqual([false, false, false, false]);
	});
});
