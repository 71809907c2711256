/**
 * Time-of-day weight rules.
 *
 * A rule multiplies the weights of the tasks it names while the current hour
 * falls inside its window. Windows are inclusive on both ends and may wrap
 * past midnight (22 → 4).
 */

export interface TimeRule {
    name: string;
    startHour: number;
    endHour: number;
    multiplier: number;
    /** Task names the rule applies to */
    tasks: string[];
}

export interface TimeRuleDefinition {
    name: string;
    start_hour: number;
    end_hour: number;
    multiplier: number;
    tasks: string[];
}

export const DEFAULT_POST_NIGHT_MULTIPLIER = 0.4;
export const DEFAULT_TWEET_NIGHT_MULTIPLIER = 0.4;
export const DEFAULT_ENGAGEMENT_DAY_MULTIPLIER = 1.5;

export function isHourInWindow(hour: number, startHour: number, endHour: number): boolean {
    if (startHour <= endHour) {
        return hour >= startHour && hour <= endHour;
    }
    return hour >= startHour || hour <= endHour;
}

/**
 * Apply every matching rule, in order, to a copy of `weights`.
 * `names[i]` is the task whose weight is `weights[i]`.
 */
export function applyTimeRules(
    hour: number,
    names: readonly string[],
    weights: readonly number[],
    rules: readonly TimeRule[],
): number[] {
    const adjusted = [...weights];
    for (const rule of rules) {
        if (!isHourInWindow(hour, rule.startHour, rule.endHour)) continue;
        names.forEach((name, i) => {
            if (rule.tasks.includes(name)) {
                adjusted[i] = (adjusted[i] ?? 0) * rule.multiplier;
            }
        });
    }
    return adjusted;
}

/** Night posting slowdown (rooms and tweets) and daytime engagement boost */
export function defaultTimeRules(multipliers: Readonly<Record<string, number>> = {}): TimeRule[] {
    return [
        {
            name: "night",
            startHour: 1,
            endHour: 5,
            multiplier: multipliers.post_night_multiplier ?? DEFAULT_POST_NIGHT_MULTIPLIER,
            tasks: ["post-echochambers"],
        },
        {
            name: "tweet-night",
            startHour: 1,
            endHour: 5,
            multiplier: multipliers.tweet_night_multiplier ?? DEFAULT_TWEET_NIGHT_MULTIPLIER,
            tasks: ["post-tweet"],
        },
        {
            name: "day",
            startHour: 8,
            endHour: 20,
            multiplier: multipliers.engagement_day_multiplier ?? DEFAULT_ENGAGEMENT_DAY_MULTIPLIER,
            tasks: ["reply-echochambers", "reply-to-tweet", "like-tweet"],
        },
    ];
}

export function timeRulesFromDefinition(
    definitions: readonly TimeRuleDefinition[] | undefined,
    multipliers: Readonly<Record<string, number>> = {},
): TimeRule[] {
    if (!definitions || definitions.length === 0) return defaultTimeRules(multipliers);
    return definitions.map((d) => ({
        name: d.name,
        startHour: d.start_hour,
        endHour: d.end_hour,
        multiplier: d.multiplier,
        tasks: [...d.tasks],
    }));
}
