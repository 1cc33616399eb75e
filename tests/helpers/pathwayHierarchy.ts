/**
 * @fileoverview A small pathway Brite hierarchy in the shape KEGG returns
 * for `get/br:br08901/json`.
 */

export const PATHWAY_HIERARCHY = {
  name: "br08901",
  children: [
    {
      name: "Metabolism",
      children: [
        {
          name: "Global and overview maps",
          children: [{ name: "01100  Metabolic pathways" }, { name: "01110  Secondary metabolites" }],
        },
        {
          name: "Carbohydrate metabolism",
          children: [{ name: "00010  Glycolysis" }],
        },
      ],
    },
    {
      name: "Human Diseases",
      children: [{ name: "Cancer: overview", children: [{ name: "05200  Pathways in cancer" }] }],
    },
  ],
};
