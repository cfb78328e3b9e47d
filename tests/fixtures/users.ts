// Test Fixtures - User Data
export const TREASURY_USER_ID = "SYSTEM_TREASURY";
export const TEST_USER_1_ID = "user_alice";
export const TEST_USER_2_ID = "user_bob";
export const TEST_USER_3_ID = "user_carol";
