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

export interface FakeResultSet {
	rows: Array<Record<string, unknown>>;
	wasApplied(): boolean;
}

export function resultSet(rows: Array<Record<string, unknown>> = [], applied = true): FakeResultSet {
	return {rows, wasApplied: () => applied};
}

export interface ExecutedStatement {
	cql: string;
	params: Record<string, unknown>;
}

export interface BatchStatement {
	query: string;
	params: Record<string, unknown>;
}

export interface ExecutedBatch {
	queries: Array<BatchStatement>;
	options: Record<string, unknown>;
}

type StatementHandler = (statement: ExecutedStatement) => FakeResultSet;

/** Records every statement sent to the driver and answers from handlers keyed by a CQL fragment. */
class CassandraStub {
	readonly executed: Array<ExecutedStatement> = [];
	readonly batches: Array<ExecutedBatch> = [];
	private handlers: Array<{fragment: string; handle: StatementHandler}> = [];
	private batchResults: Array<FakeResultSet | Error> = [];

	/** Later handlers win over earlier ones for the same statement. */
	on(fragment: string, handle: StatementHandler): this {
		this.handlers.unshift({fragment, handle});
		return this;
	}

	queueBatchResult(...results: Array<FakeResultSet | Error>): this {
		this.batchResults.push(...results);
		return this;
	}

	executedMatching(fragment: string): Array<ExecutedStatement> {
		return this.executed.filter((statement) => statement.cql.includes(fragment));
	}

	execute(cql: string, params: Record<string, unknown>): FakeResultSet {
		const statement = {cql, params};
		this.executed.push(statement);
		const handler = this.handlers.find((candidate) => cql.includes(candidate.fragment));
		return handler ? handler.handle(statement) : resultSet();
	}

	batch(queries: Array<BatchStatement>, options: Record<string, unknown>): FakeResultSet {
		this.batches.push({queries, options});
		const result = this.batchResults.shift() ?? resultSet();
		if (result instanceof Error) {
			throw result;
		}
		return result;
	}

	reset(): void {
		this.executed.length = 0;
		this.batches.length = 0;
		this.handlers = [];
		this.batchResults = [];
	}
}

export const cassandraStub = new CassandraStub();

/** Stands in for `cassandra.Client` under `vi.mock('cassandra-driver')`. */
export class FakeCassandraClient {
	constructor(readonly options: unknown) {}

	async connect(): Promise<void> {}

	async shutdown(): Promise<void> {}

	async execute(cql: string, params: Record<string, unknown>): Promise<FakeResultSet> {
		return cassandraStub.execute(cql, params);
	}

	async batch(queries: Array<BatchStatement>, options: Record<string, unknown>): Promise<FakeResultSet> {
		return cassandraStub.batch(queries, options);
	}
}
