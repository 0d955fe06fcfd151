/**
 * Tolerance for the tangent feasibility checks.
 *
 * Applied in three places:
 * - containment: circles count as nested when d² <= (rA - rB)² + TANGENCY_EPSILON
 * - tangent family: a family is skipped when |c| > 1 + TANGENCY_EPSILON
 * - contact tangent: the visibility engine skips a tangent whose squared
 *   length is <= TANGENCY_EPSILON, since its direction is rounding noise
 *
 * Exact comparison flips between "no tangents" and "some tangents" on rounding
 * noise for circles that touch internally; with the tolerance, internally
 * touching circles report no tangents and externally touching circles keep
 * their (coincident) internal pair.
 */
export const TANGENCY_EPSILON = 1e-9;
