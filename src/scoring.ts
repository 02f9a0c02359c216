/**
 * Merge request priority scoring.
 *
 * Pure function: higher score is processed first. Every term is
 * non-decreasing in urgency, age, retries and convoy age, so an MR never
 * ranks below an otherwise identical peer that is newer, less retried or
 * not convoy-linked.
 */

import { HOUR_MS } from "./constants.js";

export interface ScoreInput {
	/** 0 is the most urgent */
	priority: number;
	createdAt?: Date;
	now: Date;
	retryCount: number;
	convoyCreatedAt?: Date;
}

export interface ScoreWeights {
	base: number;
	/** Subtracted per priority level */
	priorityStep: number;
	agePerHour: number;
	retryStep: number;
	/** Retries past this count add nothing */
	maxRetryBonus: number;
	convoyBonus: number;
	convoyAgePerHour: number;
}

export const DEFAULT_SCORE_WEIGHTS: Readonly<ScoreWeights> = {
	base: 1000,
	priorityStep: 100,
	agePerHour: 1,
	retryStep: 25,
	maxRetryBonus: 4,
	convoyBonus: 100,
	convoyAgePerHour: 2,
};

function hoursSince(then: Date | undefined, now: Date): number {
	if (!then || Number.isNaN(then.getTime())) {
		return 0;
	}
	return Math.max(0, (now.getTime() - then.getTime()) / HOUR_MS);
}

export function scoreMergeRequest(input: ScoreInput, weights: Readonly<ScoreWeights> = DEFAULT_SCORE_WEIGHTS): number {
	const retries = Math.min(Math.max(0, input.retryCount), weights.maxRetryBonus);

	let score =
		weights.base -
		input.priority * weights.priorityStep +
		hoursSince(input.createdAt, input.now) * weights.agePerHour +
		retries * weights.retryStep;

	if (input.convoyCreatedAt) {
		score += weights.convoyBonus + hoursSince(input.convoyCreatedAt, input.now) * weights.convoyAgePerHour;
	}
	return score;
}
