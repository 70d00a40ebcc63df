export const MODEL_NAMES = {
    USER: "users",
    FEEDBACK: "feedback",
    NETWORK_LOG: "network_logs",
    COUNTER: "counters",
} as const;
