export const DEFAULT_K = 5; // Peers queried per lookup round
export const DEFAULT_ROUND_TIMEOUT = 5000; // 5 seconds, 0 disables it
