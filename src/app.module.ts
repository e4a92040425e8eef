import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { HttpLoggerMiddleware } from './common/http-logger.middleware';
import { HealthModule } from './modules/health/health.module';
import { TodosModule } from './modules/todos/todos.module';
import { NotesModule } from './modules/notes/notes.module';
import { PreferencesModule } from './modules/preferences/preferences.module';
import { RecipesModule } from './modules/recipes/recipes.module';
import { AccountsModule } from './modules/accounts/accounts.module';
import { McpModule } from './modules/mcp/mcp.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    HealthModule,
    TodosModule,
    NotesModule,
    PreferencesModule,
    RecipesModule,
    AccountsModule,
    McpModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(HttpLoggerMiddleware).forRoutes('*');
  }
}
