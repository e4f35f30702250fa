import { CauseListType } from '@courtgate/core';
import { z } from 'zod';

const DATE_PATTERN = /^(\d{2})-(\d{2})-(\d{4})$/;
const CNR_PATTERN = /^[A-Za-z0-9]{16}$/;

function code(field: string) {
	return z
		.string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
		.trim()
		.min(1, `${field} must not be empty`);
}

export interface CalendarDate {
	readonly day: number;
	readonly month: number;
	readonly year: number;
}

/** Parses `DD-MM-YYYY`; `undefined` unless it names a real calendar day. */
export function parseCalendarDate(value: string): CalendarDate | undefined {
	const match = DATE_PATTERN.exec(value);
	if (!match) return undefined;

	const day = Number(match[1]);
	const month = Number(match[2]);
	const year = Number(match[3]);
	const probe = new Date(Date.UTC(year, month - 1, day));
	if (
		probe.getUTCFullYear() !== year ||
		probe.getUTCMonth() !== month - 1 ||
		probe.getUTCDate() !== day
	) {
		return undefined;
	}
	return { day, month, year };
}

export const statesSchema = z.object({});

export const districtsSchema = z.object({
	state_code: code('state_code'),
});

export const courtComplexSchema = districtsSchema.extend({
	district_code: code('district_code'),
});

export const courtNamesSchema = courtComplexSchema.extend({
	court_code: code('court_code'),
});

export const causeListSchema = courtNamesSchema.extend({
	court_number: code('court_number'),
	cause_list_type: z.nativeEnum(CauseListType, {
		errorMap: () => ({ message: "cause_list_type must be 'CIVIL' or 'CRIMINAL'" }),
	}),
	date: z
		.string({ required_error: 'date is required', invalid_type_error: 'date must be a string' })
		.transform((value, ctx) => {
			if (!DATE_PATTERN.test(value)) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'date must be in DD-MM-YYYY format' });
				return z.NEVER;
			}
			const calendar = parseCalendarDate(value);
			if (!calendar) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'date is not a valid calendar date' });
				return z.NEVER;
			}
			return { text: value, ...calendar };
		}),
});

export const caseDetailSchema = z.object({
	cnr: z
		.string({ required_error: 'cnr is required' })
		.trim()
		.regex(CNR_PATTERN, 'cnr must be 16 alphanumeric characters')
		.transform((value) => value.toUpperCase()),
});

export type CauseListInput = z.output<typeof causeListSchema>;
