/**
 * Keeps the accuracy of recent simulation runs for the model performance card.
 * Only runs with a known accuracy are recorded.
 */

const MAX_RUNS = 50;

export interface AccuracyRun {
    accuracy: number; // 0-1
    year: number;
    startWeek: number;
    endWeek: number;
    completedAt: Date;
}

export class AccuracyHistory {
    private runs: AccuracyRun[] = [];

    record(run: AccuracyRun): void {
        this.runs = [...this.runs, run].slice(-MAX_RUNS);
    }

    latest(): AccuracyRun | null {
        return this.runs.length > 0 ? this.runs[this.runs.length - 1] : null;
    }

    previous(): AccuracyRun | null {
        return this.runs.length > 1 ? this.runs[this.runs.length - 2] : null;
    }

    size(): number {
        return this.runs.length;
    }
}
