export type MessagePredicate = (message: string) => boolean;

export type EventDefinition = {
  name: string;
  matchesStart: MessagePredicate;
  matchesEnd: MessagePredicate;
  warnThresholdMs?: number; // undefined: never flagged as slow
};

export type SignalKind = 'start' | 'end';

export type Signal = {
  kind: SignalKind;
  definition: EventDefinition;
};

/**
 * Classify one log message against the configured definitions.
 * Start predicates are tried across every definition before any end predicate,
 * so configuration order only breaks ties within the same kind.
 */
export function classifyMessage(definitions: readonly EventDefinition[], message: string): Signal | undefined {
  for (const definition of definitions) {
    if (definition.matchesStart(message)) return { kind: 'start', definition };
  }
  for (const definition of definitions) {
    if (definition.matchesEnd(message)) return { kind: 'end', definition };
  }
  return undefined;
}

/** Search semantics: the pattern may match anywhere in the message. */
export function regexPredicate(pattern: RegExp): MessagePredicate {
  // A global or sticky regex keeps lastIndex between calls, so test against a stateless copy
  const re = pattern.global || pattern.sticky ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '')) : pattern;
  return message => re.test(message);
}
