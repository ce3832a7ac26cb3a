import { isAction, isValidRequest, type Action, type RequestOf, type ResponseOf } from "./actions.js";
import type { CallFrame } from "./envelope.js";
import { buildCallError, ProtocolError, type CallErrorPayload } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { PayloadValidator } from "./validator.js";

export type ActionHandler<A extends Action, Context> = (
  payload: RequestOf<A>,
  context: Context,
) => ResponseOf<A> | Promise<ResponseOf<A>>;

/** One handler per action; leaving an action out is a type error. */
export type HandlerMap<A extends Action, Context> = { [K in A]: ActionHandler<K, Context> };

export type DispatchOutcome =
  | { kind: "result"; payload: unknown }
  | { kind: "error"; payload: CallErrorPayload };

export interface ActionDispatcherOptions<A extends Action, Context> {
  handlers: HandlerMap<A, Context>;
  validator: PayloadValidator;
  logger?: Logger;
}

export class ActionDispatcher<A extends Action, Context> {
  private readonly handlers: HandlerMap<A, Context>;
  private readonly validator: PayloadValidator;
  private readonly logger: Logger;

  constructor(options: ActionDispatcherOptions<A, Context>) {
    this.handlers = options.handlers;
    this.validator = options.validator;
    this.logger = options.logger ?? createLogger("dispatcher");
  }

  supports(action: string): action is A {
    return Object.hasOwn(this.handlers, action);
  }

  async dispatch(call: CallFrame, context: Context): Promise<DispatchOutcome> {
    const { id, action, payload } = call;

    if (!this.supports(action)) {
      if (isAction(action)) {
        this.logger.warn(`Call ${id}: action ${action} is not handled by this side`);
        return failure(buildCallError("NotSupported", `Action ${action} is not supported here`));
      }
      this.logger.warn(`Call ${id}: unknown action ${JSON.stringify(action)}`);
      return failure(buildCallError("NotImplemented", `Unknown action ${action}`));
    }

    if (!isValidRequest(this.validator, action, payload)) {
      this.logger.warn(`Call ${id}: ${action} payload failed validation`);
      return failure(
        buildCallError("FormationViolation", `Payload for ${action} failed validation`),
      );
    }

    try {
      const result = await this.invoke(action, payload, context);
      return { kind: "result", payload: result };
    } catch (error) {
      if (error instanceof ProtocolError) {
        this.logger.warn(`Call ${id}: ${action} handler refused the call`, error.message);
        return failure(error.toCallError());
      }
      this.logger.error(`Call ${id}: ${action} handler failed`, error);
      return failure(buildCallError("InternalError", `Handler for ${action} failed`));
    }
  }

  private async invoke<K extends A>(
    action: K,
    payload: RequestOf<K>,
    context: Context,
  ): Promise<ResponseOf<K>> {
    const handler: ActionHandler<K, Context> = this.handlers[action];
    return handler(payload, context);
  }
}

function failure(payload: CallErrorPayload): DispatchOutcome {
  return { kind: "error", payload };
}
