import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient, SupabaseClient } from '@supabase/supabase-js';

@Injectable()
export class SupabaseService implements OnModuleInit {
  private readonly logger = new Logger(SupabaseService.name);
  private client: SupabaseClient | null = null;

  constructor(private configService: ConfigService) {}

  onModuleInit() {
    this.initialize();
  }

  /**
   * 是否配置了 Supabase（未配置时任务存储回退到内存）
   */
  isConfigured(): boolean {
    return Boolean(
      this.configService.get<string>('supabase.url') &&
        this.configService.get<string>('supabase.serviceRoleKey'),
    );
  }

  getClient(): SupabaseClient {
    const client = this.client ?? this.initialize();
    if (!client) {
      throw new Error('Supabase is not configured');
    }
    return client;
  }

  private initialize(): SupabaseClient | null {
    if (this.client) return this.client;

    const url = this.configService.get<string>('supabase.url');
    const serviceRoleKey = this.configService.get<string>('supabase.serviceRoleKey');

    if (!url || !serviceRoleKey) {
      this.logger.warn('Supabase configuration missing');
      return null;
    }

    this.client = createClient(url, serviceRoleKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });

    this.logger.log('Supabase client initialized');
    return this.client;
  }
}
