import { Module } from "@nestjs/common";
import { ConfigModule, ConfigType } from "@nestjs/config";
import { MongooseModule } from "@nestjs/mongoose";
import { appConfig, reviewsConfig } from "./config/configuration";
import { DatabaseModule } from "./common/database/database.module";
import { AuthModule } from "./auth/auth.module";
import { OrdersModule } from "./orders/orders.module";
import { ProductsModule } from "./products/products.module";
import { NotificationModule } from "./notification/notification.module";
import { ReviewsModule } from "./reviews/reviews.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env.local", ".env"],
      load: [appConfig, reviewsConfig],
    }),
    MongooseModule.forRootAsync({
      inject: [appConfig.KEY],
      useFactory: (app: ConfigType<typeof appConfig>) => ({
        uri: app.mongodbUri,
      }),
    }),
    DatabaseModule,
    AuthModule,
    OrdersModule,
    ProductsModule,
    NotificationModule,
    ReviewsModule,
  ],
})
export class AppModule {}
