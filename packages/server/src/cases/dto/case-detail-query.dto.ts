import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class CaseDetailQueryDto {
	@IsString()
	@IsNotEmpty()
	@MaxLength(100)
	cnr!: string;
}
