import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  ValidateBy,
  ValidateNested,
  ValidationOptions,
  buildMessage,
} from 'class-validator';
import { DeploymentEntry, SONG_STATUSES, isRecord } from '../catalog/song.model';

function IsDeploymentEntry(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isDeploymentEntry',
      validator: {
        validate: (value: unknown) => (typeof value === 'string' && value.trim() !== '') || isRecord(value),
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must hold platform names or objects`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}

export class DeploymentsDto {
  @IsOptional()
  @IsArray()
  @IsDeploymentEntry({ each: true })
  distribution?: DeploymentEntry[];

  @IsOptional()
  @IsArray()
  @IsDeploymentEntry({ each: true })
  sync_libraries?: DeploymentEntry[];

  @IsOptional()
  @IsArray()
  @IsDeploymentEntry({ each: true })
  streaming?: DeploymentEntry[];
}

export class UpdateSongDto {
  @IsOptional()
  @IsString()
  title?: string;

  @IsOptional()
  @IsString()
  artist?: string;

  @IsOptional()
  @IsIn([...SONG_STATUSES])
  status?: string;

  @IsOptional()
  @IsString()
  legacy_code?: string;

  @IsOptional()
  @IsObject()
  registration?: Record<string, unknown>;

  @IsOptional()
  @ValidateNested()
  @Type(() => DeploymentsDto)
  deployments?: DeploymentsDto;
}

export class AddExpenseDto {
  @IsNumber()
  amount!: number;

  @IsString()
  @IsNotEmpty()
  category!: string;
}

export class AddRevenueDto {
  @IsNumber()
  amount!: number;

  @IsString()
  @IsNotEmpty()
  source!: string;
}

export class FindSongQueryDto {
  @IsString()
  @IsNotEmpty()
  title!: string;
}
