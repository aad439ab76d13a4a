import { provider, stateProvider } from "@unistate/core";

export const counterProvider = stateProvider(() => 0, { name: "counter" });

export const doubledCounterProvider = provider(ref => ref.watch(counterProvider) * 2, { name: "doubledCounter" });
