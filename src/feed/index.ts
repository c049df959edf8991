export {
  FeedSelector,
  selectEntries,
  categoryTerm,
  createFeedParser,
  EXCLUDED_CATEGORY,
  type FeedEntry,
  type FeedItem,
  type FeedParser,
} from "./selector.js";
export {
  REFERENCE_TIME_ZONE,
  calendarDate,
  previousCalendarDate,
  yesterdayIn,
} from "./calendar.js";
