import { IsNotEmpty, IsString } from 'class-validator';

export class DistrictsDto {
	@IsString()
	@IsNotEmpty()
	state_code!: string;
}
