import { IsNotEmpty, IsString } from 'class-validator';
import { DistrictsDto } from './districts.dto.js';

export class CourtComplexDto extends DistrictsDto {
	@IsString()
	@IsNotEmpty()
	district_code!: string;
}
