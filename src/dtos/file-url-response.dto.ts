import { IsString } from "class-validator";

/** Body of a successful `GET {endpoint}/{key}`. */
export class FileUrlResponseDto {
  @IsString({ message: "url must be a string" })
  url!: string;
}
