import { Annotation, END, StateGraph } from "@langchain/langgraph";
import { asMessage } from "../../src/core/errors/errors";
import type {
  RecommendationRequest,
  RecommendationResult,
} from "../../src/core/resolver/resolver.types";
import type { SessionStore } from "../../src/session/session.types";

export interface TurnResolver {
  resolve(request: RecommendationRequest): Promise<RecommendationResult>;
}

export interface TurnGraphDeps {
  readonly resolver: TurnResolver;
  readonly sessionStore: Pick<SessionStore, "appendTurn">;
  readonly onWarn?: (message: string) => void;
}

export interface RunTurnInput {
  readonly request: RecommendationRequest;
  readonly signal?: AbortSignal;
}

export const TurnStateAnnotation = Annotation.Root({
  request: Annotation<RecommendationRequest>,
  result: Annotation<RecommendationResult | undefined>,
  recorded: Annotation<boolean>,
  recordError: Annotation<string | undefined>,
  stepLog: Annotation<string[]>,
});

export type TurnState = typeof TurnStateAnnotation.State;

/**
 * resolve -> record_turn. The turn is written only once a complete result
 * exists, and not at all when the caller aborted before the write.
 */
export function buildTurnGraph(deps: TurnGraphDeps, signal?: AbortSignal) {
  const warn = deps.onWarn ?? ((message: string) => console.warn(message));

  const graph = new StateGraph(TurnStateAnnotation)
    .addNode("resolve", async (state: TurnState) => {
      signal?.throwIfAborted();
      const result = await deps.resolver.resolve(state.request);
      return { result, stepLog: [...state.stepLog, "resolve"] };
    })
    .addNode("record_turn", async (state: TurnState) => {
      const stepLog = [...state.stepLog, "record_turn"];
      if (!state.result || signal?.aborted) {
        return { recorded: false, stepLog };
      }
      try {
        await deps.sessionStore.appendTurn(state.request.sessionId, {
          userQuery: state.request.userQuery,
          detectedCategories: state.result.categoriesUsed,
          recommendedIds: state.result.items,
          excludedIds: state.request.explicitExclusions,
          tier: state.result.tierUsed,
        });
        return { recorded: true, stepLog };
      } catch (error) {
        const message = asMessage(error);
        warn(`TURN_NOT_RECORDED session=${state.request.sessionId}: ${message}`);
        return { recorded: false, recordError: message, stepLog };
      }
    });

  graph.setEntryPoint("resolve");
  graph.addConditionalEdges("resolve", (state: TurnState) =>
    state.result && !signal?.aborted ? "record_turn" : END
  );
  graph.addEdge("record_turn", END);

  return graph.compile();
}

export async function runTurnGraph(input: RunTurnInput, deps: TurnGraphDeps): Promise<TurnState> {
  input.signal?.throwIfAborted();
  const app = buildTurnGraph(deps, input.signal);
  const finalState = await app.invoke({
    request: input.request,
    result: undefined,
    recorded: false,
    recordError: undefined,
    stepLog: [],
  });
  input.signal?.throwIfAborted();
  return finalState;
}
