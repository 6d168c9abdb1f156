export * from "@/lib/memory/types";
export { MemoryAllocator, type AllocatorOptions } from "@/lib/memory/allocator";
export { PageTable } from "@/lib/memory/paging";
export { selectExtent } from "@/lib/memory/placement";
