export * from '../../@stackweaver/toolkit-lib/lib/api/io/private';
