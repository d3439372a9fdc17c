/*
 * Copyright (C) 2026 Fluxer Contributors
 *
 * This file is part of Fluxer.
 *
 * Fluxer is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * Fluxer is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU Affero General Public License for more details.
 *
 * You should have received a copy of the GNU Affero General Public License
 * along with Fluxer. If not, see <https://www.gnu.org/licenses/>.
 */

import {Config} from '@platewatch/api/src/Config';
import {Logger} from '@platewatch/api/src/Logger';
import cassandra from 'cassandra-driver';

export type DbOp<T> = {kind: 'set'; value: T} | {kind: 'clear'};

export const Db = {
	set<T>(value: T): DbOp<T> {
		return {kind: 'set', value};
	},
	clear<T = never>(): DbOp<T> {
		return {kind: 'clear'};
	},
} as const;

/**
 * Calculates the next version number for optimistic locking.
 * New records start at version 1, existing records increment by 1.
 */
export function nextVersion(current: number | null | undefined): number {
	return (current ?? 0) + 1;
}

export type ColumnName<Row> = Extract<keyof Row, string>;
type RowValue<Row, K extends ColumnName<Row>> = Row[K & keyof Row];

export type CassandraParam =
	| string
	| number
	| bigint
	| boolean
	| Buffer
	| Date
	| Set<unknown>
	| Map<unknown, unknown>
	| Array<unknown>
	| null;

export type CassandraParams = Record<string, CassandraParam>;

export interface PreparedQuery<P extends CassandraParams = CassandraParams> {
	cql: string;
	params: P;
}

export function prepared<P extends CassandraParams>(cql: string, params: P): PreparedQuery<P> {
	return {cql, params};
}

let client: cassandra.Client | null = null;

function getClient(): cassandra.Client {
	if (client) return client;

	const clientOptions: cassandra.ClientOptions = {
		contactPoints: Config.cassandra.hosts.split(','),
		keyspace: Config.cassandra.keyspace,
		localDataCenter: Config.cassandra.localDc,
		encoding: {
			map: Map,
			set: Set,
			useUndefinedAsUnset: false,
			useBigIntAsLong: true,
			useBigIntAsVarint: true,
		},
	};

	if (Config.cassandra.username && Config.cassandra.password) {
		clientOptions.credentials = {
			username: Config.cassandra.username,
			password: Config.cassandra.password,
		};
	}

	client = new cassandra.Client(clientOptions);
	return client;
}

export async function connectCassandra(): Promise<void> {
	await getClient().connect();
	Logger.info({keyspace: Config.cassandra.keyspace}, 'Connected to Cassandra');
}

export async function shutdownCassandra(): Promise<void> {
	if (!client) return;
	const current = client;
	client = null;
	await current.shutdown();
}

function isUnsafePreparedStatement(query: string): boolean {
	const tokens = query.trim().split(/\s+/);
	return tokens.length >= 2 && tokens[0].toLowerCase() === 'select' && tokens[1] === '*';
}

function assertNoUndefinedParams(params: Record<string, unknown>): void {
	for (const [key, value] of Object.entries(params)) {
		if (value === undefined) {
			throw new Error(
				`Undefined value at ":${key}". Cassandra params must use null explicitly or omit the column via PATCH.`,
			);
		}
		if (Array.isArray(value) && value.some((item) => item === undefined)) {
			throw new Error(`Undefined entry inside ":${key}"`);
		}
	}
}

function normalizeExecuteArgs<P extends CassandraParams>(
	queryOrPrepared: string | PreparedQuery<P>,
	params?: P,
): PreparedQuery<P> {
	if (typeof queryOrPrepared === 'string') {
		if (!params) {
			throw new Error('Missing params object for Cassandra query execution');
		}
		return {cql: queryOrPrepared, params};
	}
	return queryOrPrepared;
}

function guardStatement(cql: string, params: CassandraParams): void {
	if (isUnsafePreparedStatement(cql)) {
		throw new Error('Cannot prepare a statement that looks like `SELECT *`');
	}
	assertNoUndefinedParams(params);
}

export async function executeQuery<T = Record<string, unknown>, P extends CassandraParams = CassandraParams>(
	queryOrPrepared: string | PreparedQuery<P>,
	params?: P,
): Promise<Array<T>> {
	const {cql, params: bound} = normalizeExecuteArgs(queryOrPrepared, params);
	guardStatement(cql, bound);

	try {
		const result = await getClient().execute(cql, bound, {prepare: true});
		return (result.rows ?? []) as Array<T>;
	} catch (err: unknown) {
		const errorMessage = err instanceof Error ? err.message : String(err);
		Logger.warn({error: errorMessage, query: cql}, 'Cassandra query failed');
		throw err;
	}
}

export async function fetchOne<T = Record<string, unknown>, P extends CassandraParams = CassandraParams>(
	queryOrPrepared: PreparedQuery<P> | string,
	params?: P,
): Promise<T | null> {
	const [row] = await executeQuery<T, P>(queryOrPrepared, params);
	return row ?? null;
}

export async function fetchMany<T = Record<string, unknown>, P extends CassandraParams = CassandraParams>(
	queryOrPrepared: PreparedQuery<P> | string,
	params?: P,
): Promise<Array<T>> {
	return executeQuery<T, P>(queryOrPrepared, params);
}

export async function executeConditional<P extends CassandraParams = CassandraParams>(
	queryOrPrepared: PreparedQuery<P> | string,
	params?: P,
): Promise<{applied: boolean; rows: Array<Record<string, unknown>>}> {
	const {cql, params: bound} = normalizeExecuteArgs(queryOrPrepared, params);
	guardStatement(cql, bound);

	try {
		const result = await getClient().execute(cql, bound, {prepare: true});
		return {applied: result.wasApplied(), rows: result.rows as Array<Record<string, unknown>>};
	} catch (err: unknown) {
		const errorMessage = err instanceof Error ? err.message : String(err);
		Logger.warn({error: errorMessage, query: cql}, 'Cassandra conditional query failed');
		throw err;
	}
}

interface BatchQuery {
	query: string;
	params: CassandraParams;
}

export async function executeBatch(queries: Array<BatchQuery>): Promise<void> {
	if (queries.length === 0) return;

	for (const {query, params} of queries) {
		guardStatement(query, params);
	}

	await getClient().batch(queries, {prepare: true, logged: true, counter: false});
}

/**
 * Runs lightweight-transaction statements that share one partition as a single batch.
 * Cassandra applies either all of them or none; `applied` reports which.
 */
export async function executeConditionalBatch(
	queries: Array<PreparedQuery>,
): Promise<{applied: boolean; rows: Array<Record<string, unknown>>}> {
	if (queries.length === 0) {
		throw new Error('Refusing to execute an empty conditional batch');
	}

	for (const {cql, params} of queries) {
		guardStatement(cql, params);
	}

	try {
		const result = await getClient().batch(
			queries.map(({cql, params}) => ({query: cql, params})),
			{prepare: true, logged: true},
		);
		return {applied: result.wasApplied(), rows: result.rows as Array<Record<string, unknown>>};
	} catch (err: unknown) {
		const errorMessage = err instanceof Error ? err.message : String(err);
		Logger.warn({error: errorMessage, statements: queries.length}, 'Cassandra conditional batch failed');
		throw err;
	}
}

export class BatchBuilder {
	private queries: Array<BatchQuery> = [];

	addPrepared(q: PreparedQuery): this {
		this.queries.push({query: q.cql, params: q.params});
		return this;
	}

	addPreparedIf(condition: boolean, q: PreparedQuery): this {
		if (condition) this.queries.push({query: q.cql, params: q.params});
		return this;
	}

	async execute(): Promise<void> {
		if (this.queries.length === 0) return;
		await executeBatch(this.queries);
	}
}

export type WhereExpr<Row extends object> =
	| {kind: 'eq'; col: ColumnName<Row>; param: string}
	| {kind: 'lt'; col: ColumnName<Row>; param: string}
	| {kind: 'gte'; col: ColumnName<Row>; param: string};

export type PatchFor<Row, PK extends ColumnName<Row>> = Partial<{
	[K in Exclude<ColumnName<Row>, PK>]: DbOp<RowValue<Row, K>>;
}>;

export interface Table<Row extends object, PK extends ColumnName<Row>, PartKey extends ColumnName<Row> = PK> {
	name: string;
	columns: ReadonlyArray<ColumnName<Row>>;
	primaryKey: ReadonlyArray<PK>;
	partitionKey: ReadonlyArray<PartKey>;

	selectCql(opts?: {
		columns?: ReadonlyArray<ColumnName<Row>>;
		where?: WhereExpr<Row> | ReadonlyArray<WhereExpr<Row>>;
		limit?: number;
	}): string;

	insert(row: Row): PreparedQuery;

	insertIfNotExists(row: Row): PreparedQuery;

	insertIfNotExistsWithTtl(row: Row, ttlSeconds: number): PreparedQuery;

	patchByPk(pk: Pick<Row, PK>, patch: PatchFor<Row, PK>): PreparedQuery;

	patchByPkIf<CondCol extends Exclude<ColumnName<Row>, PK>>(
		pk: Pick<Row, PK>,
		patch: PatchFor<Row, PK>,
		condition: {col: CondCol; expectedParam: string; expectedValue: RowValue<Row, CondCol>},
	): PreparedQuery;

	deleteByPk(pk: Pick<Row, PK>): PreparedQuery;

	where: {
		eq: <K extends ColumnName<Row>>(col: K, param?: string) => WhereExpr<Row>;
		lt: <K extends ColumnName<Row>>(col: K, param?: string) => WhereExpr<Row>;
		gte: <K extends ColumnName<Row>>(col: K, param?: string) => WhereExpr<Row>;
	};
}

function compileWhere<Row extends object>(w: WhereExpr<Row>): string {
	switch (w.kind) {
		case 'eq':
			return `${w.col} = :${w.param}`;
		case 'lt':
			return `${w.col} < :${w.param}`;
		case 'gte':
			return `${w.col} >= :${w.param}`;
		default: {
			const _exhaustive: never = w;
			return _exhaustive;
		}
	}
}

function opToValue(op: DbOp<unknown>): CassandraParam {
	return op.kind === 'clear' ? null : (op.value as CassandraParam);
}

export function defineTable<Row extends object, PK extends ColumnName<Row>, PartKey extends ColumnName<Row> = PK>(def: {
	name: string;
	columns: ReadonlyArray<ColumnName<Row>>;
	primaryKey: ReadonlyArray<PK>;
	partitionKey?: ReadonlyArray<PartKey>;
}): Table<Row, PK, PartKey> {
	const columns = [...def.columns];
	const pk = [...def.primaryKey];
	const partitionKey = [...(def.partitionKey ?? def.primaryKey)] as Array<PartKey>;
	const pkWhere = pk.map((k) => `${k} = :${k}`).join(' AND ');

	function paramsFromRow(row: Row): CassandraParams {
		const params: CassandraParams = {};
		for (const c of columns) {
			const v = row[c as keyof Row];
			if (v === undefined) {
				throw new Error(
					`Row is missing value for "${def.name}.${c}". Full-row inserts require every column to be present (use patchByPk() for partial writes).`,
				);
			}
			params[c] = v as CassandraParam;
		}
		return params;
	}

	function sortedPatchKeys(patch: PatchFor<Row, PK>): Array<Exclude<ColumnName<Row>, PK>> {
		const patchKeys = Object.keys(patch) as Array<Exclude<ColumnName<Row>, PK>>;
		if (patchKeys.length === 0) {
			throw new Error(`Refusing to execute empty PATCH update on table "${def.name}"`);
		}
		return patchKeys.sort((a, b) => columns.indexOf(a) - columns.indexOf(b));
	}

	function patchParams(pkValues: Pick<Row, PK>, patch: PatchFor<Row, PK>, patchKeys: ReadonlyArray<string>) {
		const params: CassandraParams = {};
		for (const k of pk) params[k] = pkValues[k] as CassandraParam;
		for (const c of patchKeys) params[c] = opToValue(patch[c as keyof typeof patch] as DbOp<unknown>);
		return params;
	}

	function selectCql(
		opts: {
			columns?: ReadonlyArray<ColumnName<Row>>;
			where?: WhereExpr<Row> | ReadonlyArray<WhereExpr<Row>>;
			limit?: number;
		} = {},
	): string {
		const selectCols = (opts.columns ?? columns).join(', ');

		let where = '';
		if (opts.where) {
			const clauses: ReadonlyArray<WhereExpr<Row>> = Array.isArray(opts.where) ? opts.where : [opts.where];
			if (clauses.length > 0) {
				where = ` WHERE ${clauses.map((c) => compileWhere<Row>(c)).join(' AND ')}`;
			}
		}

		const limit = typeof opts.limit === 'number' ? ` LIMIT ${opts.limit}` : '';

		return `SELECT ${selectCols} FROM ${def.name}${where}${limit};`;
	}

	const insertBaseCql = `INSERT INTO ${def.name} (${columns.join(', ')}) VALUES (${columns.map((c) => `:${c}`).join(', ')})`;

	function patchByPk(pkValues: Pick<Row, PK>, patch: PatchFor<Row, PK>): PreparedQuery {
		const patchKeys = sortedPatchKeys(patch);
		const cql = `UPDATE ${def.name}
SET ${patchKeys.map((c) => `${c} = :${c}`).join(', ')}
WHERE ${pkWhere};
`;
		return prepared(cql, patchParams(pkValues, patch, patchKeys));
	}

	function patchByPkIf<CondCol extends Exclude<ColumnName<Row>, PK>>(
		pkValues: Pick<Row, PK>,
		patch: PatchFor<Row, PK>,
		condition: {col: CondCol; expectedParam: string; expectedValue: RowValue<Row, CondCol>},
	): PreparedQuery {
		const patchKeys = sortedPatchKeys(patch);
		const cql = `UPDATE ${def.name}
SET ${patchKeys.map((c) => `${c} = :${c}`).join(', ')}
WHERE ${pkWhere}
IF ${condition.col} = :${condition.expectedParam};
`;
		const params = patchParams(pkValues, patch, patchKeys);
		params[condition.expectedParam] = condition.expectedValue as CassandraParam;
		return prepared(cql, params);
	}

	function deleteByPk(pkValues: Pick<Row, PK>): PreparedQuery {
		const params: CassandraParams = {};
		for (const k of pk) params[k] = pkValues[k] as CassandraParam;
		return prepared(`DELETE FROM ${def.name} WHERE ${pkWhere};`, params);
	}

	return {
		name: def.name,
		columns: def.columns,
		primaryKey: def.primaryKey,
		partitionKey,

		selectCql,

		insert(row: Row) {
			return prepared(`${insertBaseCql};`, paramsFromRow(row));
		},

		insertIfNotExists(row: Row) {
			return prepared(`${insertBaseCql} IF NOT EXISTS;`, paramsFromRow(row));
		},

		insertIfNotExistsWithTtl(row: Row, ttlSeconds: number) {
			return prepared(`${insertBaseCql} IF NOT EXISTS USING TTL ${Math.max(1, Math.floor(ttlSeconds))};`, paramsFromRow(row));
		},

		patchByPk,
		patchByPkIf,
		deleteByPk,

		where: {
			eq: (col, param) => ({kind: 'eq', col, param: param ?? col}),
			lt: (col, param) => ({kind: 'lt', col, param: param ?? col}),
			gte: (col, param) => ({kind: 'gte', col, param: param ?? col}),
		},
	};
}

const DEFAULT_LWT_RETRIES = 5;

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export type PatchObject = {[key: string]: DbOp<unknown>};

export async function executeVersionedUpdate<
	Row extends {version?: number | null},
	PK extends ColumnName<Row>,
	Patch extends PatchObject = PatchObject,
>(
	fetchCurrent: () => Promise<Row | null>,
	buildPatch: (current: Row | null) => {pk: Pick<Row, PK>; patch: Patch},
	table: Table<Row, PK>,
	opts?: {maxRetries?: number; initialData?: Row | null},
): Promise<{applied: boolean; finalVersion: number | null}> {
	const maxRetries = opts?.maxRetries ?? DEFAULT_LWT_RETRIES;

	for (let attempt = 0; attempt < maxRetries; attempt++) {
		const current = attempt === 0 && opts?.initialData !== undefined ? opts.initialData : await fetchCurrent();
		const currentVersion = current?.version ?? null;
		const newVersion = nextVersion(currentVersion);

		const {pk, patch} = buildPatch(current);

		const q = table.patchByPkIf(pk, {...patch, version: Db.set(newVersion)} as PatchFor<Row, PK>, {
			col: 'version' as Exclude<ColumnName<Row>, PK>,
			expectedParam: 'prev_version',
			expectedValue: currentVersion as RowValue<Row, Exclude<ColumnName<Row>, PK>>,
		});

		const res = await executeConditional(q);
		if (res.applied) {
			return {applied: true, finalVersion: newVersion};
		}

		if (attempt < maxRetries - 1) {
			const baseDelay = 10;
			const backoffDelay = baseDelay * 2 ** attempt;
			const jitter = Math.random() * 10;
			await sleep(backoffDelay + jitter);
		}
	}

	throw new Error('LWT update failed after max retries due to concurrent modifications');
}

function valuesEqual(a: unknown, b: unknown): boolean {
	if (a === b) return true;
	if (a == null || b == null) return false;

	if (a instanceof Date && b instanceof Date) {
		return a.getTime() === b.getTime();
	}

	if (Array.isArray(a) && Array.isArray(b)) {
		return a.length === b.length && a.every((item, index) => valuesEqual(item, b[index]));
	}

	return false;
}

export function buildPatchFromData<Row extends object>(
	newData: Partial<Row>,
	oldData: Partial<Row> | null,
	columns: ReadonlyArray<keyof Row>,
	pkColumns: ReadonlyArray<keyof Row>,
): Record<string, DbOp<unknown>> {
	const patch: Record<string, DbOp<unknown>> = {};
	for (const col of columns) {
		if (pkColumns.includes(col)) continue;
		if (col === 'version') continue;

		const newVal = newData[col];
		if (newVal === undefined) continue;

		const oldVal = oldData ? oldData[col] : undefined;

		if (valuesEqual(newVal, oldVal)) continue;

		if (newVal === null) {
			if (oldData !== null && oldVal !== null && oldVal !== undefined) {
				patch[String(col)] = Db.clear();
			}
		} else {
			patch[String(col)] = Db.set(newVal);
		}
	}

	return patch;
}
