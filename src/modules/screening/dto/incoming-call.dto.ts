import { IsOptional, IsString, MaxLength } from 'class-validator';
import { MAX_PHONE_INPUT_LENGTH } from './classify.dto';

export class IncomingCallDto {
  @IsString()
  @MaxLength(MAX_PHONE_INPUT_LENGTH)
  phoneNumber!: string;

  @IsString()
  @IsOptional()
  @MaxLength(100)
  contactName?: string;
}
