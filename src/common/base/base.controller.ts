import type { Response } from "express";
import { BaseService } from "./base.service";

/**
 * Base controller: per-class logger, operation timing and client-disconnect signals
 */
export abstract class BaseController extends BaseService {
  protected readonly startupTime: number = Date.now();

  /**
   * Signal that aborts when the client closes the connection before the response is written
   */
  protected createDisconnectSignal(response: Response): AbortSignal {
    const controller = new AbortController();
    response.once("close", () => {
      if (!response.writableFinished) {
        controller.abort(new Error("Client disconnected"));
      }
    });
    return controller.signal;
  }

  /**
   * Run a handler body, logging how long it took
   */
  protected async executeOperation<T>(operationName: string, operation: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await operation();
      this.logger.debug(`${operationName} completed in ${Date.now() - startedAt}ms`);
      return result;
    } catch (error) {
      this.logger.debug(`${operationName} failed after ${Date.now() - startedAt}ms`);
      throw error;
    }
  }
}
