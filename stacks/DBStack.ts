import { type StackContext, Table } from "sst/constructs";

export function DBStack({ stack }: StackContext) {
  // tenant partition, one item per generated uuid
  const peliculas_table = new Table(stack, "Peliculas", {
    fields: {
      tenant_id: "string",
      uuid: "string",
    },
    primaryIndex: { partitionKey: "tenant_id", sortKey: "uuid" },
  });

  return { peliculas_table };
}
