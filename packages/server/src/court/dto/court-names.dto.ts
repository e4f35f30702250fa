import { IsNotEmpty, IsString } from 'class-validator';
import { CourtComplexDto } from './court-complex.dto.js';

export class CourtNamesDto extends CourtComplexDto {
	@IsString()
	@IsNotEmpty()
	court_code!: string;
}
