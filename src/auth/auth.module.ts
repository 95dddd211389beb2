import { Module } from "@nestjs/common";
import { PassportModule } from "@nestjs/passport";
import { JwtStrategy } from "./strategies/jwt.strategy";
import { OptionalJwtAuthGuard } from "./strategies/optional-jwt.strategy";

// token ออกโดย account service; ที่นี่แค่ verify
@Module({
  imports: [PassportModule],
  providers: [JwtStrategy, OptionalJwtAuthGuard],
  exports: [PassportModule, OptionalJwtAuthGuard],
})
export class AuthModule {}
