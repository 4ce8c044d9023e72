import { IsNotEmpty, IsString } from "class-validator";

/** Body of a successful upload or delete; echoes the stored key. */
export class FileKeyResponseDto {
  @IsString({ message: "key must be a string" })
  @IsNotEmpty({ message: "key is required" })
  key!: string;
}
