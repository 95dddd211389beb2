import { Injectable } from "@nestjs/common";
import { InjectConnection } from "@nestjs/mongoose";
import type { ClientSession, Connection } from "mongoose";

/**
 * Handle passed to repositories so that every read and write of one
 * operation lands in the same transaction.
 */
export interface UnitOfWork {
  readonly session?: ClientSession;
}

export abstract class TransactionRunner {
  /** Runs `work` atomically; any throw rolls back every write made through the unit of work. */
  abstract run<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T>;
}

@Injectable()
export class MongoTransactionRunner extends TransactionRunner {
  constructor(@InjectConnection() private readonly conn: Connection) {
    super();
  }

  // Connection.transaction ใช้ withTransaction ภายใน -> retry เองเมื่อเจอ TransientTransactionError (write conflict)
  run<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    return this.conn.transaction((session) => work({ session }));
  }
}
