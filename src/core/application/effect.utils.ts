import { Effect, Either } from "effect";
import { RelayError, StorageError, errorMessage } from "../errors";
import {
  ActivityLogService,
  ChatClientService,
  ClockService,
  InjectorsService,
  MessageFlagService,
  NotifierService,
  StateStoreService,
  type RelayServiceImpls,
  type RelayServices,
} from "./services.types";

/** Lifts a port call into the relay error channel; errors that are already `RelayError`s pass through untouched. */
export function attempt<A>(task: () => Promise<A>, onError: (error: unknown) => RelayError): Effect.Effect<A, RelayError> {
  return Effect.tryPromise({
    try: task,
    catch: (error) => (error instanceof RelayError ? error : onError(error)),
  });
}

export function storageFailure(store: string): (error: unknown) => RelayError {
  return (error) => new StorageError(store, errorMessage(error), { cause: error });
}

export function provideRelayServices<A>(
  program: Effect.Effect<A, RelayError, RelayServices>,
  services: RelayServiceImpls,
): Effect.Effect<A, RelayError> {
  return Effect.provideService(
    Effect.provideService(
      Effect.provideService(
        Effect.provideService(
          Effect.provideService(
            Effect.provideService(
              Effect.provideService(program, ChatClientService, services.chatClient),
              StateStoreService,
              services.stateStore,
            ),
            ClockService,
            services.clock,
          ),
          NotifierService,
          services.notifier,
        ),
        InjectorsService,
        services.injectors,
      ),
      ActivityLogService,
      services.activityLog,
    ),
    MessageFlagService,
    services.messageFlag,
  );
}

/** Runs a workflow and rethrows its typed failure as-is, so callers can branch on the error class. */
export async function runRelayProgram<A>(
  program: Effect.Effect<A, RelayError, RelayServices>,
  services: RelayServiceImpls,
): Promise<A> {
  const result = await Effect.runPromise(Effect.either(provideRelayServices(program, services)));
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
