import { InvalidRequestError } from "../../src/core/errors/errors";
import type {
  RecommendationRequest,
  RecommendationResult,
} from "../../src/core/resolver/resolver.types";
import type { Session, SessionStore } from "../../src/session/session.types";
import { runTurnGraph, type TurnResolver } from "../graph/turn.graph";

export interface HistorySessionStore extends SessionStore {
  getSessionHistory(sessionId: string): Promise<Session>;
}

export interface RecommendationServiceDeps {
  readonly resolver: TurnResolver;
  readonly sessionStore: HistorySessionStore;
  readonly onWarn?: (message: string) => void;
}

export interface RecommendOptions {
  readonly signal?: AbortSignal;
}

export interface TurnOutcome {
  readonly result: RecommendationResult;
  readonly recorded: boolean;
  readonly recordError?: string;
}

export function assertValidRequest(request: RecommendationRequest): void {
  if (typeof request.sessionId !== "string" || request.sessionId.trim() === "") {
    throw new InvalidRequestError("INVALID_REQUEST sessionId must be a non-empty string");
  }
  if (typeof request.userQuery !== "string") {
    throw new InvalidRequestError("INVALID_REQUEST userQuery must be a string");
  }
  if (!Number.isInteger(request.n) || request.n < 0) {
    throw new InvalidRequestError("INVALID_REQUEST n must be an integer >= 0");
  }
}

/** Outer surface used by the conversation handler and the local CLI. */
export class RecommendationService {
  constructor(private readonly deps: RecommendationServiceDeps) {}

  /** Resolve only; nothing is recorded. */
  async resolve(request: RecommendationRequest): Promise<RecommendationResult> {
    assertValidRequest(request);
    return this.deps.resolver.resolve(request);
  }

  /** Resolve, then record the turn. A failed write is reported, never thrown. */
  async recommend(
    request: RecommendationRequest,
    options: RecommendOptions = {}
  ): Promise<TurnOutcome> {
    assertValidRequest(request);
    const state = await runTurnGraph(
      { request, signal: options.signal },
      {
        resolver: this.deps.resolver,
        sessionStore: this.deps.sessionStore,
        onWarn: this.deps.onWarn,
      }
    );
    if (!state.result) {
      throw new Error(`TURN_GRAPH_ERROR no result for session=${request.sessionId}`);
    }
    return {
      result: state.result,
      recorded: state.recorded,
      recordError: state.recordError,
    };
  }

  async getSessionHistory(sessionId: string): Promise<Session> {
    if (typeof sessionId !== "string" || sessionId.trim() === "") {
      throw new InvalidRequestError("INVALID_REQUEST sessionId must be a non-empty string");
    }
    return this.deps.sessionStore.getSessionHistory(sessionId);
  }
}
