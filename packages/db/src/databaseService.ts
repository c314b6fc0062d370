import {Db} from "./controller/index.js";

export type DatabaseApiOptions = {
  controller: Db;
};

/**
 * Owns the lifecycle of a controller shared by a group of repositories
 */
export abstract class DatabaseService {
  protected db: Db;

  protected constructor(opts: DatabaseApiOptions) {
    this.db = opts.controller;
  }

  async start(): Promise<void> {
    await this.db.start();
  }

  async stop(): Promise<void> {
    await this.db.stop();
  }
}
