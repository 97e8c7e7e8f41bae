import { PointFilterCriteria } from "./interfaces/PointFilterCriteria";
import { TestPoint } from "./interfaces/ITestPointService";

export function hasCriteria(criteria: PointFilterCriteria | undefined): criteria is PointFilterCriteria {
  return (
    criteria !== undefined &&
    (criteria.currentOutcome !== undefined ||
      criteria.automated !== undefined ||
      criteria.state !== undefined ||
      criteria.nameContains !== undefined)
  );
}

export function matchesCriteria(point: TestPoint, criteria?: PointFilterCriteria): boolean {
  if (!criteria) return true;

  if (criteria.currentOutcome !== undefined && point.currentOutcome !== criteria.currentOutcome) {
    return false;
  }
  if (criteria.automated !== undefined && point.automated !== criteria.automated) {
    return false;
  }
  if (criteria.state !== undefined && point.state !== criteria.state) {
    return false;
  }
  if (criteria.nameContains !== undefined) {
    const title = (point.details?.title ?? point.testCaseName).toLowerCase();
    if (!title.includes(criteria.nameContains.toLowerCase())) return false;
  }
  return true;
}

export function filterPoints(points: TestPoint[], criteria?: PointFilterCriteria): TestPoint[] {
  return points.filter((point) => matchesCriteria(point, criteria));
}

export function describeCriteria(criteria?: PointFilterCriteria): string {
  if (!hasCriteria(criteria)) return "None (all points)";
  return Object.entries(criteria)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(", ");
}
