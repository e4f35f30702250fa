import { IsNotEmpty, IsString } from 'class-validator';
import { CourtNamesDto } from './court-names.dto.js';

/** `cause_list_type` and `date` formats are checked by the gateway itself. */
export class CauseListDto extends CourtNamesDto {
	@IsString()
	@IsNotEmpty()
	court_number!: string;

	@IsString()
	cause_list_type!: string;

	@IsString()
	date!: string;
}
