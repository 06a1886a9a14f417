/** Suffix appended to the inbound topic when no response topic is configured. */
export const RESPONSE_TOPIC_SUFFIX = "_response";
/** Suffix appended to the inbound topic when no consumer group is configured. */
export const GROUP_ID_SUFFIX = "_group";

export interface TopicSettings {
  inboundTopic: string;
  responseTopic?: string;
  groupId?: string;
}

export interface ResolvedTopics {
  responseTopic: string;
  groupId: string;
}

/**
 * Derive the response topic and consumer group from the inbound topic.
 * Explicit values are used verbatim; blank ones count as unset.
 *
 * @example
 * ```ts
 * resolveTopics({ inboundTopic: "requests" });
 * // { responseTopic: "requests_response", groupId: "requests_group" }
 * ```
 */
export function resolveTopics(settings: TopicSettings): ResolvedTopics {
  return {
    responseTopic: nonBlank(settings.responseTopic) ??
      `${settings.inboundTopic}${RESPONSE_TOPIC_SUFFIX}`,
    groupId: nonBlank(settings.groupId) ??
      `${settings.inboundTopic}${GROUP_ID_SUFFIX}`,
  };
}

function nonBlank(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== "" ? value : undefined;
}
