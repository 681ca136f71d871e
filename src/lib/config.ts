export const CONFIG = {
  periods: {
    // Observations per year / per window for the frequencies the dashboard loads
    tradingDaysPerYear: 252,
    weeksPerYear: 52,
    oneMonthDaily: 21,
    threeMonthsDaily: 63,
    oneMonthWeekly: 4,
    threeMonthsWeekly: 13,
  },
  dataQuality: {
    maxAgeDays: 7,
    minCoreIndicators: 3,
  },
  alerts: {
    summaryWindow: 10,
    recentDefault: 10,
  },
} as const
