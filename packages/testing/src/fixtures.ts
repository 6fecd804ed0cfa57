import type { JsonObject } from "@waypoint/core";

export const TEST_THREAD_ID = "thread-1";
export const OTHER_THREAD_ID = "thread-2";

export function conversationState(step: number): JsonObject {
  return {
    messages: Array.from({ length: step }, (_, index) => ({
      role: index % 2 === 0 ? "user" : "assistant",
      content: `message ${index + 1}`
    })),
    step,
    done: false
  };
}

export const DEFAULT_METADATA: JsonObject = {
  user_id: "user-456",
  source: "contract"
};
