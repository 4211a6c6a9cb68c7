export const minScore = 1;
export const maxScore = 10;

export const dailyResultNotificationType = "daily_result";
export const referralRewardNotificationType = "referral_reward";
export const referralRewardType = "credits";
export const referralRewardVersion = "v2";
export const legacyReferralRewardVersion = "legacy_pre_v2";
