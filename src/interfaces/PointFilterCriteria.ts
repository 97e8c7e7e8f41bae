
export type PointFilterCriteria = {
    currentOutcome?: string;
    automated?: boolean;
    state?: string;
    nameContains?: string;
};
