import { ApiProperty } from '@nestjs/swagger';
import {
  ArrayNotEmpty,
  IsArray,
  IsNotEmpty,
  IsString,
  IsUrl,
  Matches,
} from 'class-validator';

// The domain ends up in a queue name, so it is restricted to host characters.
export const DOMAIN_PATTERN = /^[a-z0-9](?:[a-z0-9.-]*[a-z0-9])?$/i;

export class CreateJobDto {
  @ApiProperty({
    description: 'Domain the URLs belong to; selects the dispatch queue',
    example: 'shop.example',
    pattern: DOMAIN_PATTERN.source,
  })
  @IsString()
  @IsNotEmpty({ message: 'domain is required' })
  @Matches(DOMAIN_PATTERN, {
    message: 'domain may only contain letters, digits, dots and hyphens',
  })
  domain!: string;

  @ApiProperty({
    description: 'Absolute URLs to scrape, all handed to one worker run',
    example: ['https://shop.example/products/1'],
    type: [String],
    minItems: 1,
  })
  @IsArray({ message: 'urls must be an array' })
  @ArrayNotEmpty({ message: 'urls must contain at least one URL' })
  @IsUrl(
    { require_protocol: true, require_tld: false },
    { each: true, message: 'each value in urls must be an absolute URL' },
  )
  urls!: string[];
}
