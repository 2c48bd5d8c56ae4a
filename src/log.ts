export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 99 };

interface LogRecordBase {
	t: string;
	lvl: string;
	evt: string;
	msg: string;
	client?: string;
	method?: string;
	url?: string;
	status?: number;
	attempt?: number;
	delayMs?: number;
	reason?: string;
	durationMs?: number;
	count?: number;
	key?: string;
	query?: string;
	space?: string;
	port?: number;
	sessionId?: string;
	ip?: string;
	prefix?: string;
	prefixReason?: string;
	version?: string;
	account?: string;
	file?: string;
	id?: string;
	range?: string;
}

export type LogEntry = Omit<LogRecordBase, 't' | 'lvl'> & { lvl?: Exclude<LogLevel, 'silent'> };

let levelOverride: LogLevel | undefined;

export function isLogLevel(v: string): v is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(v);
}

export function isTruthy(v: string | undefined): boolean {
	return /^(1|true|yes|on)$/i.test((v || '').trim());
}

/** Pins the threshold; `undefined` goes back to reading LOG_LEVEL / DEBUG. */
export function setLogLevel(level: LogLevel | undefined) {
	levelOverride = level;
}

export function currentLogLevel(): LogLevel {
	if (levelOverride) return levelOverride;
	const fromEnv = (process.env.LOG_LEVEL || '').trim().toLowerCase();
	if (isLogLevel(fromEnv)) return fromEnv;
	return isTruthy(process.env.DEBUG) ? 'debug' : 'info';
}

function plain(r: LogRecordBase) {
	const parts: string[] = [r.t, r.lvl.toUpperCase(), r.evt];
	if (r.client) parts.splice(2, 0, '[' + r.client + ']');
	parts.push(r.msg);
	return parts.join(' ');
}

export function log(entry: LogEntry) {
	const lvl = entry.lvl || 'info';
	if (RANK[lvl] < RANK[currentLogLevel()]) return;
	const rec: LogRecordBase = {
		t: new Date().toISOString(),
		...entry,
		lvl,
	};
	if (process.env.LOG_PRETTY) console.log(plain(rec));
	else console.log(JSON.stringify(rec));
}

export type Logger = typeof log;
