export const REASON_TOO_RECENT_OR_NO_DATE = 'too recent or no date';
export const REASON_NOT_UNNECESSARY = 'not unnecessary';
