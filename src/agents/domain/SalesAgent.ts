import { dbg } from '../../utils';

/**
 * A trained sales model. Each feature row is `[year, month]`; one prediction per row.
 */
export interface SalesForecaster {
    predict(features: number[][]): number[];
}

export const NO_FORECASTER_REPLY = "Sales forecasting model not available.";
export const NEEDS_DETAILS_REPLY = "Sales Agent received the request but needs more details.";

/**
 * Answers sales requests. Forecasts need a forecaster; without one the agent says so.
 */
export class SalesAgent {
    constructor(private readonly forecaster: SalesForecaster | null = null) {}

    handleRequest(request: string, now: Date = new Date()): string {
        if (request.toLowerCase().includes('forecast')) {
            return this.generateForecast(now);
        }
        return NEEDS_DETAILS_REPLY;
    }

    generateForecast(now: Date = new Date()): string {
        if (!this.forecaster) {
            return NO_FORECASTER_REPLY;
        }
        // Date months are 0-based; the forecaster takes 1-based months
        const next = new Date(now.getFullYear(), now.getMonth() + 1, 1);
        const features = [[next.getFullYear(), next.getMonth() + 1]];
        dbg(`SalesAgent: Forecasting for ${JSON.stringify(features)}`);
        const forecast = this.forecaster.predict(features);
        return `Sales forecast for next month: ${JSON.stringify(forecast)}`;
    }
}
